import { Router } from "express";
import { QueueController } from "../controllers/queue.controller";

export function createQueueRoutes(queueController: QueueController): Router {
  const router = Router();

  router.get("/queue", (req, res) => queueController.overview(req, res));
  router.post("/queue/clear-completed", (req, res) => queueController.clearCompleted(req, res));

  router.get("/history", (req, res) => queueController.history(req, res));
  router.get("/history/stats", (req, res) => queueController.historyStats(req, res));

  return router;
}
