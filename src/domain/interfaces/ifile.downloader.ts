export interface DownloadedFile {
  path: string;
  filename: string;
  size: number;
  contentType?: string;
}

export interface IFileDownloader {
  download(url: string, targetDir: string, signal?: AbortSignal): Promise<DownloadedFile>;
}
