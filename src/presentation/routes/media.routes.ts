import { Router } from "express";
import multer from "multer";
import { MediaController } from "../controllers/media.controller";
import { GIF_MAX_IMAGE_BYTES, GIF_MAX_IMAGES } from "../../domain/utils/gif.frames";

const uploadAudio = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 200 * 1024 * 1024, // 200MB limit for audio
  },
});

const uploadImages = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: GIF_MAX_IMAGE_BYTES,
  },
});

const uploadFile = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 500 * 1024 * 1024,
  },
});

export function createMediaRoutes(mediaController: MediaController): Router {
  const router = Router();

  router.post("/audio-to-text", uploadAudio.single("audio_file"), (req, res) =>
    mediaController.audioToText(req, res)
  );

  // Clients send either images[] or images
  router.post(
    "/photos-to-gif",
    uploadImages.fields([
      { name: "images[]", maxCount: GIF_MAX_IMAGES },
      { name: "images", maxCount: GIF_MAX_IMAGES },
    ]),
    (req, res) => mediaController.photosToGif(req, res)
  );

  router.post("/convert", uploadFile.single("file"), (req, res) => mediaController.convert(req, res));

  return router;
}
