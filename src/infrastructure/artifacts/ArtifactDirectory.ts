import fs from 'node:fs/promises';
import path from 'node:path';
import { randomBytes } from 'node:crypto';
import type { ArtifactMetadata, ArtifactPort } from '../../domain/ports/ArtifactPort.js';
import type { DownloadedArtifact } from '../../domain/entities/DownloadedArtifact.js';
import { ResourceNotFoundError } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';

const TEMP_DIR_NAME = '.incoming';
const PARTIAL_SUFFIX = '.partial';

/** YYYYMMDD_HHmmss（本地時間） */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
    + `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/** 檔名只留英數、底線與連字號 */
export function safeFilePart(value: string): string {
  const cleaned = value.replace(/[^A-Za-z0-9_-]+/g, '_').replace(/^_+|_+$/g, '');
  return cleaned || 'document';
}

/**
 * 下載與截圖目錄
 *
 * 下載先落在 downloadDir/.incoming/*.partial，完成後由 claim() 改名為
 * `<documentType>_<YYYYMMDD_HHmmss>_<8 hex>.<ext>`；中途失敗的檔案一律刪除。
 */
export class ArtifactDirectory implements ArtifactPort {
  readonly tempDir: string;
  private readonly logger = new Logger('ArtifactDirectory');

  constructor(
    private readonly downloadDir: string,
    private readonly screenshotDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.tempDir = path.join(downloadDir, TEMP_DIR_NAME);
  }

  async claim(tempPath: string, meta: ArtifactMetadata): Promise<DownloadedArtifact> {
    const stat = await fs.stat(tempPath).catch((err: unknown) => {
      throw new ResourceNotFoundError('Downloaded file is missing', { cause: err });
    });
    if (stat.size === 0) {
      await this.discard(tempPath);
      throw new ResourceNotFoundError(`The portal returned an empty ${meta.format} for ${meta.documentType}`);
    }

    await fs.mkdir(this.downloadDir, { recursive: true });
    const createdAt = this.now();
    const fileName = `${safeFilePart(meta.documentType)}_${formatTimestamp(createdAt)}_${randomBytes(4).toString('hex')}`
      + `.${safeFilePart(meta.format)}`;
    const localPath = path.resolve(this.downloadDir, fileName);
    await fs.rename(tempPath, localPath);

    this.logger.debug('Download stored', { documentType: meta.documentType, sizeBytes: stat.size });
    return { localPath, sourceUrl: meta.sourceUrl, sizeBytes: stat.size, createdAt: createdAt.getTime() };
  }

  async discard(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }

  async screenshotPath(prefix: string): Promise<string> {
    await fs.mkdir(this.screenshotDir, { recursive: true });
    const name = `${safeFilePart(prefix)}_${formatTimestamp(this.now())}_${randomBytes(4).toString('hex')}.png`;
    return path.resolve(this.screenshotDir, name);
  }

  async purgeTemp(): Promise<void> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.tempDir);
    } catch (err) {
      if (isMissing(err)) return;
      throw err;
    }
    const leftovers = entries.filter((name) => name.endsWith(PARTIAL_SUFFIX));
    await Promise.all(leftovers.map((name) => fs.rm(path.join(this.tempDir, name), { force: true })));
    if (leftovers.length > 0) {
      this.logger.info('Removed unfinished downloads', { count: leftovers.length });
    }
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
