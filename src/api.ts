import express, { Router, Request, Response } from "express";
import bodyParser from "body-parser";

import type { Db } from "./db.js";
import { deleteRegion, getRegionPolygons, getRegions, insertRegion, parsePolygonPayload } from "./dbHelpers.js";
import type { GeoDataStore } from "./geoDataStore.js";

function parseCoordinate(raw: unknown): number | null {
  if (typeof raw !== "string" || raw.trim() === "") return null;
  const value = Number(raw);
  return Number.isNaN(value) ? null : value;
}

export function createApi(store: GeoDataStore, db: Db): Router {
  const router = Router();

  // ---------- queries ----------
  router.get("/contains", (req: Request, res: Response) => {
    const lng = parseCoordinate(req.query.lng);
    const lat = parseCoordinate(req.query.lat);

    if (lng === null || lat === null) {
      return res.status(400).json({ error: "lng and lat must be numbers" });
    }

    res.json({ lng, lat, contains: store.contains(lng, lat) });
  });

  // ---------- geodata file ----------
  router.get("/geodata", (_req, res) => {
    res.json(store.stats());
  });

  router.post("/geodata/reload", (_req, res) => {
    const error = store.reload();
    if (error) {
      return res.status(422).json({ error: error.message, kind: error.kind });
    }
    res.json(store.stats());
  });

  router.post("/geodata/build", (_req, res) => {
    const error = store.rebuild(getRegionPolygons(db));
    if (error) {
      return res.status(422).json({ error: error.message, kind: error.kind });
    }
    res.json(store.stats());
  });

  // ---------- regions ----------
  router.get("/regions", (_req, res) => {
    res.json(getRegions(db));
  });

  router.post("/regions", (req: Request, res: Response) => {
    const payload = parsePolygonPayload(req.body);
    if (!payload) {
      return res.status(400).json({ error: "Invalid payload" });
    }

    const id = insertRegion(db, payload.name, payload.polygon);
    res.status(201).json({ id });
  });

  router.delete("/regions/:id", (req: Request, res: Response) => {
    const id = Number(req.params.id);
    if (!Number.isInteger(id)) {
      return res.status(400).json({ error: "Invalid region ID" });
    }

    if (!deleteRegion(db, id)) {
      return res.status(404).json({ error: "Region not found" });
    }

    res.status(204).send();
  });

  return router;
}

export function createApp(store: GeoDataStore, db: Db): express.Express {
  const app = express();
  app.use(bodyParser.json());
  app.use(createApi(store, db));
  return app;
}
