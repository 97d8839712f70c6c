import { Router } from "express";
import { container } from "../../../di/Container";
import { CommentariesController } from "../controllers/CommentariesController";

/**
 * Commentaries Routes
 */
export function createCommentariesRouter(): Router {
  const router = Router();
  const controller = container.resolve(CommentariesController);

  router.get("/", (req, res, next) => controller.list(req, res, next));

  router.get("/:slug", (req, res, next) =>
    controller.getBySlug(req, res, next),
  );

  router.get("/:slug/:book/:chapter", (req, res, next) =>
    controller.getChapter(req, res, next),
  );

  router.get("/:slug/:book/:chapter/:verse", (req, res, next) =>
    controller.getVerse(req, res, next),
  );

  return router;
}
