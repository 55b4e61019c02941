import { Response } from "express";
import { AuthenticatedRequest } from "../middleware/jwt.middleware";
import { sendError } from "../middleware/error.middleware";
import { SubmitAudioTranscriptionUseCase } from "../../application/use-cases/submit-audio-transcription.use-case";
import { SubmitImagesToGifUseCase } from "../../application/use-cases/submit-images-to-gif.use-case";
import { SubmitFormatConversionUseCase } from "../../application/use-cases/submit-format-conversion.use-case";
import { collectFiles, readBody, toUploadedFile } from "../dto/request.dto";
import { taskApiUrls, toTaskCreatedResponse } from "../dto/task.dto";

export class MediaController {
  constructor(
    private submitAudioTranscriptionUseCase: SubmitAudioTranscriptionUseCase,
    private submitImagesToGifUseCase: SubmitImagesToGifUseCase,
    private submitFormatConversionUseCase: SubmitFormatConversionUseCase
  ) {}

  async audioToText(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const task = await this.submitAudioTranscriptionUseCase.execute({
        file: req.file ? toUploadedFile(req.file) : undefined,
        fields: readBody(req),
        createdBy: req.user?.userId,
      });
      res.status(202).json(toTaskCreatedResponse(task, "Audio queued for transcription"));
    } catch (error: unknown) {
      sendError(res, error, "Failed to queue transcription");
    }
  }

  async photosToGif(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const task = await this.submitImagesToGifUseCase.execute({
        files: collectFiles(req, ["images[]", "images"]),
        fields: readBody(req),
        createdBy: req.user?.userId,
      });
      res.status(202).json(toTaskCreatedResponse(task, "Images queued for GIF creation"));
    } catch (error: unknown) {
      sendError(res, error, "Failed to queue GIF creation");
    }
  }

  async convert(req: AuthenticatedRequest, res: Response): Promise<void> {
    try {
      const fields = readBody(req);
      const { task, estimatedTimeSec } = await this.submitFormatConversionUseCase.execute({
        file: req.file ? toUploadedFile(req.file) : undefined,
        sourceFormat: fields.source_format,
        targetFormat: fields.target_format,
        params: fields.params,
        createdBy: req.user?.userId,
      });
      res.status(202).json({
        success: true,
        task_id: task.id,
        message: "Conversion queued",
        estimated_time: estimatedTimeSec,
        api_urls: taskApiUrls(task.id),
      });
    } catch (error: unknown) {
      sendError(res, error, "Failed to queue conversion");
    }
  }
}
