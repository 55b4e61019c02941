import request from "supertest";
import { TestApp, createTestApp } from "../fakes/test-app";

describe("Media API", () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await createTestApp();
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await ctx.cleanup();
  });

  describe("POST /api/audio-to-text", () => {
    it("queues a transcription with normalized options", async () => {
      const res = await request(ctx.app)
        .post("/api/audio-to-text")
        .field("language", "en-US")
        .field("output_format", "srt")
        .field("remove_silence", "true")
        .attach("audio_file", Buffer.from("RIFF"), "talk.wav");

      expect(res.status).toBe(202);
      expect(res.body).toMatchObject({ success: true, task_id: "task-1", message: "Audio queued for transcription" });
      const task = ctx.tasks.tasks.get("task-1");
      expect(task).toMatchObject({ kind: "audio_to_text", targetFormat: "srt", originalFilename: "talk.wav" });
      expect(task?.conversionParams).toEqual({
        language: "en-US",
        quality: "standard",
        output_format: "srt",
        enhance_speech: true,
        remove_silence: true,
        use_whisper: true,
      });
      expect(ctx.jobs.jobs.get("job-1")).toMatchObject({ name: "audio.transcribe", queue: "audio_processing" });
    });

    it("requires the audio file", async () => {
      const res = await request(ctx.app).post("/api/audio-to-text").field("language", "en-US");

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("An audio_file upload is required");
    });

    it("rejects unsupported audio formats", async () => {
      const res = await request(ctx.app).post("/api/audio-to-text").attach("audio_file", Buffer.from("x"), "talk.exe");

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Unsupported audio format. Allowed: mp3, wav, m4a, flac, ogg, aac, wma");
    });

    it("rejects unsupported languages", async () => {
      const res = await request(ctx.app)
        .post("/api/audio-to-text")
        .field("language", "xx-XX")
        .attach("audio_file", Buffer.from("RIFF"), "talk.wav");

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Unsupported language: xx-XX");
    });
  });

  describe("POST /api/photos-to-gif", () => {
    it("queues a GIF from images[] uploads", async () => {
      const res = await request(ctx.app)
        .post("/api/photos-to-gif")
        .field("frame_duration", "0.25")
        .field("pingpong", "true")
        .attach("images[]", Buffer.from("first"), "a.png")
        .attach("images[]", Buffer.from("second"), "b.jpg");

      expect(res.status).toBe(202);
      expect(res.body.message).toBe("Images queued for GIF creation");
      const task = ctx.tasks.tasks.get("task-1");
      expect(task).toMatchObject({ kind: "images_to_gif", targetFormat: "gif", fileSize: 11, metadata: { images_count: 2 } });
      expect(task?.inputFiles.map((file) => file.originalName)).toEqual(["a.png", "b.jpg"]);
      expect(task?.conversionParams).toMatchObject({ frame_duration: 0.25, pingpong: true, sort_order: "upload" });
      expect(ctx.jobs.jobs.get("job-1")).toMatchObject({ name: "images.gif", queue: "image_processing" });
    });

    it("needs at least two images", async () => {
      const res = await request(ctx.app).post("/api/photos-to-gif").attach("images", Buffer.from("only"), "a.png");

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("At least 2 images are required");
    });

    it("rejects a frame duration out of range", async () => {
      const res = await request(ctx.app)
        .post("/api/photos-to-gif")
        .field("frame_duration", "9")
        .attach("images", Buffer.from("first"), "a.png")
        .attach("images", Buffer.from("second"), "b.png");

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Frame duration must be between 0.1 and 5.0 seconds");
    });

    it("rejects files under an unknown field", async () => {
      const res = await request(ctx.app).post("/api/photos-to-gif").attach("photo", Buffer.from("first"), "a.png");

      expect(res.status).toBe(400);
      expect(res.body.code).toBe("LIMIT_UNEXPECTED_FILE");
    });
  });

  describe("POST /api/convert", () => {
    it("queues a supported conversion with an estimate", async () => {
      const res = await request(ctx.app)
        .post("/api/convert")
        .field("source_format", "video")
        .field("target_format", "webm")
        .field("params", JSON.stringify({ quality: "high" }))
        .attach("file", Buffer.from("video-bytes"), "clip.mp4");

      expect(res.status).toBe(202);
      expect(res.body).toEqual({
        success: true,
        task_id: "task-1",
        message: "Conversion queued",
        estimated_time: 5,
        api_urls: {
          status: "/api/tasks/task-1/status",
          result: "/api/tasks/task-1/result",
          download: "/api/tasks/task-1/download",
        },
      });
      const task = ctx.tasks.tasks.get("task-1");
      expect(task).toMatchObject({ targetFormat: "webm", conversionParams: { quality: "high" }, metadata: { source_format: "video" } });
    });

    it("rejects a file that does not match the source format", async () => {
      const res = await request(ctx.app)
        .post("/api/convert")
        .field("source_format", "image")
        .field("target_format", "png")
        .attach("file", Buffer.from("video-bytes"), "clip.mp4");

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("File type does not match source_format image");
    });

    it("rejects conversions outside the matrix", async () => {
      const res = await request(ctx.app)
        .post("/api/convert")
        .field("source_format", "video")
        .field("target_format", "pdf")
        .attach("file", Buffer.from("video-bytes"), "clip.mp4");

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Conversion from video to pdf is not supported");
    });

    it("does not accept archives as a conversion source", async () => {
      const res = await request(ctx.app)
        .post("/api/convert")
        .field("source_format", "archive")
        .field("target_format", "zip")
        .attach("file", Buffer.from("PK"), "backup.tar.gz");

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("source_format must be one of video, image, audio, document");
      expect(ctx.tasks.tasks.size).toBe(0);
    });

    it("rejects params that are not JSON", async () => {
      const res = await request(ctx.app)
        .post("/api/convert")
        .field("source_format", "video")
        .field("target_format", "mp4")
        .field("params", "{quality")
        .attach("file", Buffer.from("video-bytes"), "clip.mp4");

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("params must be valid JSON");
    });
  });
});
