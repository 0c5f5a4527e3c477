/** 下載完成的檔案；回傳後由呼叫端擁有 */
export interface DownloadedArtifact {
  localPath: string;
  sourceUrl: string;
  sizeBytes: number;
  createdAt: number;
}
