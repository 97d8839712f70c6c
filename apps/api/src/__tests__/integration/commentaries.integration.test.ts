import { describe, it, expect, beforeEach } from "@jest/globals";
import request from "supertest";
import { Express } from "express";
import {
  createTestApp,
  getTestLogger,
  getTestRepository,
  ingestManifest,
} from "../helpers/testApp";

describe("Commentaries API Integration Tests", () => {
  let app: Express;

  beforeEach(async () => {
    // Create fresh app with in-memory repository for each test
    app = createTestApp();

    // Clear repository data
    getTestRepository().clear();
    getTestLogger().clear();

    await ingestManifest({
      commentary: {
        slug: "jfb",
        name: "Jamieson-Fausset-Brown",
        license: "Public Domain",
        language: "en",
      },
      entries: [
        { book: "Jn", chapter: 3, verse: "16", text: "T" },
        { book: "Romans", chapter: 8, verse: "1-3", text: "T2" },
        { book: "Romans", chapter: 8, verse_start: 4, text: "T3" },
      ],
    });
  });

  describe("GET /health", () => {
    it("should report the service as up", async () => {
      const response = await request(app).get("/health").expect(200);

      expect(response.body).toEqual({
        ok: true,
        service: "commentary-api",
        version: "1.0.0",
      });
    });
  });

  describe("GET /books", () => {
    it("should list the 66 canonical books", async () => {
      const response = await request(app).get("/books").expect(200);

      expect(response.body.ok).toBe(true);
      expect(response.body.books).toHaveLength(66);
      expect(response.body.books[42]).toEqual({
        canonical: "John",
        testament: "NT",
        position: 43,
        aliases: ["jhn", "jn"],
      });
    });
  });

  describe("GET /commentaries", () => {
    it("should list stored commentaries", async () => {
      const response = await request(app).get("/commentaries").expect(200);

      expect(response.body).toEqual({
        ok: true,
        commentaries: [
          {
            slug: "jfb",
            name: "Jamieson-Fausset-Brown",
            description: null,
            source: null,
            license: "Public Domain",
            language: "en",
          },
        ],
      });
    });
  });

  describe("GET /commentaries/:slug", () => {
    it("should return commentary metadata", async () => {
      const response = await request(app).get("/commentaries/JFB").expect(200);

      expect(response.body.ok).toBe(true);
      expect(response.body.commentary.slug).toBe("jfb");
    });

    it("should find a commentary by display name", async () => {
      const response = await request(app)
        .get("/commentaries/Jamieson-Fausset-Brown")
        .expect(200);

      expect(response.body.commentary.slug).toBe("jfb");
    });

    it("should return 404 for an unknown commentary", async () => {
      const response = await request(app)
        .get("/commentaries/gill")
        .expect(404);

      expect(response.body).toEqual({
        error: "Commentary 'gill' not found",
        code: "ENTITY_NOT_FOUND",
      });
    });
  });

  describe("GET /commentaries/:slug/:book/:chapter", () => {
    it("should return the chapter in verse order", async () => {
      const response = await request(app)
        .get("/commentaries/jfb/rom/8")
        .expect(200);

      expect(response.body.ok).toBe(true);
      expect(response.body.book).toBe("Romans");
      expect(response.body.chapter).toBe(8);
      expect(response.body.count).toBe(2);
      expect(response.body.entries).toEqual([
        { verse_start: 1, verse_end: 3, text: "T2" },
        { verse_start: 4, verse_end: 4, text: "T3" },
      ]);
    });

    it("should resolve spaced and numbered book names", async () => {
      const response = await request(app)
        .get("/commentaries/jfb/1%20Samuel/1")
        .expect(200);

      expect(response.body.book).toBe("1 Samuel");
      expect(response.body.count).toBe(0);
    });

    it("should return 400 for a non-numeric chapter", async () => {
      const response = await request(app)
        .get("/commentaries/jfb/John/abc")
        .expect(400);

      expect(response.body).toEqual({
        error: "Invalid chapter: abc",
        code: "MALFORMED_VERSE_EXPRESSION",
        field: "chapter",
        raw: "abc",
      });
    });

    it("should return 400 for chapter zero", async () => {
      const response = await request(app)
        .get("/commentaries/jfb/John/0")
        .expect(400);

      expect(response.body.code).toBe("OUT_OF_RANGE");
      expect(response.body.error).toBe("chapter must be positive, got 0");
    });

    it("should return 400 for an unknown book", async () => {
      const response = await request(app)
        .get("/commentaries/jfb/Hezekiah/1")
        .expect(400);

      expect(response.body).toEqual({
        error: "Unknown book: Hezekiah",
        code: "UNKNOWN_BOOK",
        field: "book",
        raw: "Hezekiah",
      });
    });

    it("should report a missing commentary before an unknown book", async () => {
      await request(app).get("/commentaries/gill/Hezekiah/1").expect(404);
    });

    it("should report a bad chapter before a missing commentary", async () => {
      await request(app).get("/commentaries/gill/John/abc").expect(400);
    });
  });

  describe("GET /commentaries/:slug/:book/:chapter/:verse", () => {
    it("should return the single-verse entry", async () => {
      const response = await request(app)
        .get("/commentaries/jfb/John/3/16")
        .expect(200);

      expect(response.body).toEqual({
        ok: true,
        commentary: {
          slug: "jfb",
          name: "Jamieson-Fausset-Brown",
          description: null,
          source: null,
          license: "Public Domain",
          language: "en",
        },
        book: "John",
        chapter: 3,
        verse: 16,
        count: 1,
        entries: [{ verse_start: 16, verse_end: 16, text: "T" }],
      });
    });

    it("should return entries spanning the verse", async () => {
      const inside = await request(app)
        .get("/commentaries/jfb/Romans/8/2")
        .expect(200);
      const outside = await request(app)
        .get("/commentaries/jfb/Romans/8/5")
        .expect(200);

      expect(inside.body.entries).toEqual([
        { verse_start: 1, verse_end: 3, text: "T2" },
      ]);
      expect(outside.body.count).toBe(0);
      expect(outside.body.entries).toEqual([]);
    });

    it("should return 400 for a malformed verse", async () => {
      const response = await request(app)
        .get("/commentaries/jfb/John/3/2.5")
        .expect(400);

      expect(response.body.code).toBe("MALFORMED_VERSE_EXPRESSION");
      expect(response.body.raw).toBe("2.5");
    });
  });

  describe("re-ingestion", () => {
    it("should serve only the replacement entries", async () => {
      await ingestManifest(
        {
          commentary: { slug: "jfb", name: "Jamieson-Fausset-Brown" },
          entries: [{ book: "Genesis", chapter: 1, verse: 1, text: "G" }],
        },
        true,
      );

      const old = await request(app)
        .get("/commentaries/jfb/John/3/16")
        .expect(200);
      const fresh = await request(app)
        .get("/commentaries/jfb/Gen/1/1")
        .expect(200);

      expect(old.body.count).toBe(0);
      expect(fresh.body.entries).toEqual([
        { verse_start: 1, verse_end: 1, text: "G" },
      ]);
    });
  });

  describe("unknown routes", () => {
    it("should return 404", async () => {
      const response = await request(app).get("/nowhere").expect(404);

      expect(response.body.code).toBe("NOT_FOUND");
      expect(response.body.error).toBe("Route GET /nowhere not found");
    });
  });
});
