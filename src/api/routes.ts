/**
 * Authoring API Routes
 *
 * Express Router exposing sessions, topic generation, chapter-map preview,
 * archive export and archive import.
 */

import { Router, type Request } from "express";
import multer from "multer";

import { readBundle } from "../exports/bundle_reader.js";
import { createDitaExportZip } from "../exports/dita_export.js";
import { buildChapterMap, type MapDoctype } from "../map/chapter_map.js";
import type { AuthoringSession } from "../session/session.js";
import type { SessionStore } from "../session/store.js";
import { InvalidBundleError, MissingTemplateError } from "../shared/errors.js";
import { isContentType, type ContentItemRequest } from "../shared/types.js";
import type { TemplateRegistry } from "../templates/registry.js";
import { NotFoundError } from "./middleware.js";
import {
  ChapterMapRequestSchema,
  CreateBatchSchema,
  CreateItemSchema,
  ExportRequestSchema,
  type CreateItemRequest,
} from "./schemas.js";

export interface RouterDeps {
  store: SessionStore;
  registry: TemplateRegistry;
  mapDoctype?: MapDoctype;
  zipLevel?: number;
  /** Upload size cap for imported archives, in bytes. */
  maxUploadBytes?: number;
}

function toItemRequest(body: CreateItemRequest): ContentItemRequest {
  if (!isContentType(body.type)) throw new MissingTemplateError(body.type);
  return { type: body.type, title: body.title, fields: body.fields };
}

export function createRouter(deps: RouterDeps): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxUploadBytes ?? 20 * 1024 * 1024 },
  });

  // Plain Request: routes behind multer lose the path-inferred params type.
  function sessionFor(req: Request): AuthoringSession {
    const session = deps.store.get(req.params.sessionId);
    if (!session) throw new NotFoundError("Session", req.params.sessionId);
    return session;
  }

  // ── GET /v1/health ────────────────────────────────────────────────

  router.get("/v1/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // ── GET /v1/templates ─────────────────────────────────────────────

  router.get("/v1/templates", (_req, res) => {
    res.json(
      deps.registry.list().map(({ type, label, prefix, rootElement, requiredFields, optionalFields }) => ({
        type, label, prefix, rootElement, requiredFields, optionalFields,
      })),
    );
  });

  // ── POST /v1/sessions ─────────────────────────────────────────────

  router.post("/v1/sessions", (_req, res) => {
    const session = deps.store.create();
    res.status(201).json({ sessionId: session.id, createdAt: session.createdAt });
  });

  // ── GET /v1/sessions/:sessionId ───────────────────────────────────

  router.get("/v1/sessions/:sessionId", (req, res) => {
    const session = sessionFor(req);
    res.json({
      sessionId: session.id,
      createdAt: session.createdAt,
      counts: session.countByType(),
      items: session.summaries(),
    });
  });

  // ── DELETE /v1/sessions/:sessionId ────────────────────────────────

  router.delete("/v1/sessions/:sessionId", (req, res) => {
    if (!deps.store.delete(req.params.sessionId)) {
      throw new NotFoundError("Session", req.params.sessionId);
    }
    res.status(204).end();
  });

  // ── POST /v1/sessions/:sessionId/items ────────────────────────────

  router.post("/v1/sessions/:sessionId/items", (req, res) => {
    const session = sessionFor(req);
    const body = CreateItemSchema.parse(req.body);
    const item = session.add(toItemRequest(body));
    res.status(201).json(item);
  });

  // ── POST /v1/sessions/:sessionId/items/batch ──────────────────────

  router.post("/v1/sessions/:sessionId/items/batch", (req, res) => {
    const session = sessionFor(req);
    const body = CreateBatchSchema.parse(req.body);
    const items = session.addBatch(body.items.map(toItemRequest));
    res.status(201).json({ items });
  });

  // ── GET /v1/sessions/:sessionId/items/:itemId ─────────────────────

  router.get("/v1/sessions/:sessionId/items/:itemId", (req, res) => {
    const item = sessionFor(req).get(req.params.itemId);
    if (!item) throw new NotFoundError("Item", req.params.itemId);
    res.type("application/xml").send(item.xml);
  });

  // ── DELETE /v1/sessions/:sessionId/items/:itemId ──────────────────

  router.delete("/v1/sessions/:sessionId/items/:itemId", (req, res) => {
    if (!sessionFor(req).remove(req.params.itemId)) {
      throw new NotFoundError("Item", req.params.itemId);
    }
    res.status(204).end();
  });

  // ── POST /v1/sessions/:sessionId/map ──────────────────────────────

  router.post("/v1/sessions/:sessionId/map", (req, res) => {
    const session = sessionFor(req);
    const body = ChapterMapRequestSchema.parse(req.body);
    const map = buildChapterMap(body.chapterName, session.list(), { doctype: deps.mapDoctype });
    res.json({ id: map.id, fileName: map.fileName, xml: map.xml });
  });

  // ── POST /v1/sessions/:sessionId/export ───────────────────────────

  router.post("/v1/sessions/:sessionId/export", async (req, res, next) => {
    try {
      const session = sessionFor(req);
      const body = ExportRequestSchema.parse(req.body ?? {});
      const result = await createDitaExportZip({
        items: session.list(),
        chapterName: body.chapterName,
        doctype: deps.mapDoctype,
        zipLevel: deps.zipLevel,
      });
      const archiveName = result.map ? `${result.map.fileName.replace(/\.ditamap$/, "")}.zip` : "xml-files.zip";

      res
        .status(200)
        .type("application/zip")
        .set("Content-Disposition", `attachment; filename="${archiveName}"`)
        .set("X-Bundle-SHA256", result.sha256)
        .send(result.zip);
    } catch (err) {
      next(err);
    }
  });

  // ── POST /v1/sessions/:sessionId/import ───────────────────────────

  router.post("/v1/sessions/:sessionId/import", upload.single("file"), (req, res) => {
    const session = sessionFor(req);
    const file = req.file;
    if (!file) throw new InvalidBundleError("no file uploaded");

    const contents = readBundle(file.buffer);
    if (contents.topics.length === 0) {
      throw new InvalidBundleError("archive contains no topic files");
    }

    const items = session.restore(contents.topics);
    res.status(201).json({
      items: items.map(({ type, title, id, fileName }) => ({ type, title, id, fileName })),
      maps: contents.maps.map((m) => m.fileName),
      skipped: contents.skipped,
    });
  });

  return router;
}
