import { Router } from "express";
import multer from "multer";
import { TaskController } from "../controllers/task.controller";

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 500 * 1024 * 1024, // 500MB limit
  },
});

export function createTaskRoutes(taskController: TaskController): Router {
  const router = Router();

  router.get("/", (req, res) => taskController.listTasks(req, res));

  // Accepts multipart uploads or a JSON body with a url
  router.post("/", upload.single("file"), (req, res) => taskController.createTask(req, res));

  // Must be registered before the :id routes
  router.get("/batch-download", (req, res) => taskController.batchDownload(req, res));
  router.post("/batch-download", (req, res) => taskController.batchDownload(req, res));

  router.get("/:id/status", (req, res) => taskController.getStatus(req, res));
  router.get("/:id/result", (req, res) => taskController.getResult(req, res));
  router.get("/:id/download", (req, res) => taskController.download(req, res));
  router.post("/:id/cancel", (req, res) => taskController.cancel(req, res));
  router.delete("/:id", (req, res) => taskController.delete(req, res));

  return router;
}
