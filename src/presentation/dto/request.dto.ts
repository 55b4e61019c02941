import { Request } from "express";
import { UploadedFile } from "../../application/use-cases/submit-conversion.use-case";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parsed body fields (JSON or multipart text fields), or an empty object. */
export function readBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

export function toUploadedFile(file: Express.Multer.File): UploadedFile {
  return {
    buffer: file.buffer,
    originalName: file.originalname,
    mimeType: file.mimetype,
    size: file.size,
  };
}

/** Files of any of the given multipart fields, in upload order. */
export function collectFiles(req: Request, fields: string[]): UploadedFile[] {
  const { files } = req;
  if (!files) {
    return [];
  }
  if (Array.isArray(files)) {
    return files.map(toUploadedFile);
  }
  return fields.flatMap((field) => (files[field] ?? []).map(toUploadedFile));
}
