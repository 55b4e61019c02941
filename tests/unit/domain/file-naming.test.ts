import {
  batchArchiveName,
  batchEntryName,
  contentTypeFor,
  downloadFilename,
  fileStem,
  safeFilename,
} from "../../../src/domain/utils/file.naming";

describe("file naming", () => {
  it("maps extensions to content types", () => {
    expect(contentTypeFor("/media/results/task_1_result.GIF")).toBe("image/gif");
    expect(contentTypeFor("notes.txt")).toBe("text/plain; charset=utf-8");
    expect(contentTypeFor("data.xyz")).toBe("application/octet-stream");
  });

  it("names downloads after the original file", () => {
    expect(fileStem("/tmp/my.video.mp4")).toBe("my.video");
    expect(downloadFilename("my.video.mp4", "gif")).toBe("my.video_converted.gif");
    expect(downloadFilename(undefined, "mp3")).toBe("result_converted.mp3");
  });

  it("de-duplicates archive entry names", () => {
    const taken = new Set(["task_t1_a.gif", "task_t1_a_1.gif"]);
    expect(batchEntryName("t1", "a.mp4", "gif", new Set())).toBe("task_t1_a.gif");
    expect(batchEntryName("t1", "a.mp4", "gif", taken)).toBe("task_t1_a_2.gif");
    expect(batchEntryName("t2", undefined, "zip", new Set())).toBe("task_t2_converted.zip");
  });

  it("stamps archive names with local time", () => {
    expect(batchArchiveName(new Date(2024, 0, 5, 7, 8, 9))).toBe("conversion_results_20240105_070809.zip");
  });

  it("strips directories and unsafe characters", () => {
    expect(safeFilename("../etc/pa ss?wd.txt")).toBe("pa_ss_wd.txt");
    expect(safeFilename("C:\\Users\\me\\photo 1.png")).toBe("photo_1.png");
    expect(safeFilename("...")).toBe("file");
  });
});
