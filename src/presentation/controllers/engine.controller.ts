import { Request, Response } from "express";
import { isEngineType } from "../../domain/enums/engine.type";
import { EngineManager } from "../../infrastructure/engines/engine.manager";
import { sendError } from "../middleware/error.middleware";
import { toDetectedFileResponse, toEngineStatusResponse } from "../dto/engine.dto";
import { toUploadedFile } from "../dto/request.dto";
import { DetectFileTypeUseCase } from "../../application/use-cases/detect-file-type.use-case";

export class EngineController {
  constructor(
    private engineManager: EngineManager,
    private detectFileTypeUseCase: DetectFileTypeUseCase
  ) {}

  async formats(req: Request, res: Response): Promise<void> {
    try {
      const { type } = req.query;
      if (type !== undefined && !isEngineType(type)) {
        res.status(400).json({ success: false, error: `Unknown engine type: ${String(type)}` });
        return;
      }
      res.status(200).json({ success: true, formats: this.engineManager.getSupportedFormats(type) });
    } catch (error: unknown) {
      sendError(res, error, "Failed to list formats");
    }
  }

  async status(_req: Request, res: Response): Promise<void> {
    try {
      const status = await this.engineManager.getEngineStatus();
      const engines = Object.fromEntries(
        Object.entries(status).map(([type, engineStatus]) => [type, toEngineStatusResponse(engineStatus)])
      );
      res.status(200).json({ success: true, engines });
    } catch (error: unknown) {
      sendError(res, error, "Failed to check engines");
    }
  }

  async detect(req: Request, res: Response): Promise<void> {
    try {
      const detected = await this.detectFileTypeUseCase.execute(req.file ? toUploadedFile(req.file) : undefined);
      res.status(200).json(toDetectedFileResponse(detected));
    } catch (error: unknown) {
      sendError(res, error, "Failed to detect file type");
    }
  }
}
