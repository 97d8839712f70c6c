import { Router } from "express";
import { container } from "../../../di/Container";
import { BooksController } from "../controllers/BooksController";

export function createBooksRouter(): Router {
  const router = Router();
  const controller = container.resolve(BooksController);

  router.get("/", (req, res, next) => controller.list(req, res, next));

  return router;
}
