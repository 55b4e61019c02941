import { Router } from "express";
import multer from "multer";
import { EngineController } from "../controllers/engine.controller";

// Only the name and size are read; the bytes are dropped with the request
const uploadProbe = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 500 * 1024 * 1024,
  },
});

export function createEngineRoutes(engineController: EngineController): Router {
  const router = Router();

  router.get("/formats", (req, res) => engineController.formats(req, res));
  router.get("/status", (req, res) => engineController.status(req, res));
  router.post("/detect", uploadProbe.single("file"), (req, res) => engineController.detect(req, res));

  return router;
}
