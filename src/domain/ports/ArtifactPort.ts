import type { DownloadedArtifact } from '../entities/DownloadedArtifact.js';

export interface ArtifactMetadata {
  documentType: string;
  format: string;
  sourceUrl: string;
}

/** 下載檔與截圖的可寫目錄 */
export interface ArtifactPort {
  /** 下載進行中的暫存目錄 */
  readonly tempDir: string;
  /** 把完成的暫存檔改為唯一檔名並驗證非空 */
  claim(tempPath: string, meta: ArtifactMetadata): Promise<DownloadedArtifact>;
  /** 刪除未完成或失敗的檔案（不存在時忽略） */
  discard(filePath: string): Promise<void>;
  screenshotPath(prefix: string): Promise<string>;
  /** 清除暫存目錄中殘留的檔案 */
  purgeTemp(): Promise<void>;
}
