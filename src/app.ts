import express, { Express } from "express";
import cors from "cors";
import { TaskController } from "./presentation/controllers/task.controller";
import { MediaController } from "./presentation/controllers/media.controller";
import { QueueController } from "./presentation/controllers/queue.controller";
import { EngineController } from "./presentation/controllers/engine.controller";
import { createTaskRoutes } from "./presentation/routes/task.routes";
import { createMediaRoutes } from "./presentation/routes/media.routes";
import { createQueueRoutes } from "./presentation/routes/queue.routes";
import { createEngineRoutes } from "./presentation/routes/engine.routes";
import { createJwtMiddleware } from "./presentation/middleware/jwt.middleware";
import { errorMiddleware } from "./presentation/middleware/error.middleware";

export interface AppDependencies {
  taskController: TaskController;
  mediaController: MediaController;
  queueController: QueueController;
  engineController: EngineController;
  mediaRoot: string;
  jwtSecret?: string; // API is open when unset
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Enable CORS for all origins
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.use("/media", express.static(deps.mediaRoot));

  if (deps.jwtSecret) {
    app.use("/api", createJwtMiddleware(deps.jwtSecret));
  }

  app.use("/api/tasks", createTaskRoutes(deps.taskController));
  app.use("/api/engines", createEngineRoutes(deps.engineController));
  app.use("/api", createMediaRoutes(deps.mediaController));
  app.use("/api", createQueueRoutes(deps.queueController));

  app.use(errorMiddleware);

  return app;
}
