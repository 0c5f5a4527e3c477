import fs from 'node:fs';
import { z } from 'zod';

const manifestSchema = z.object({ version: z.string() });

/** 從 package.json 讀取版本號，避免硬編碼導致版本不同步 */
export function packageVersion(): string {
  // src/shared 與 dist/shared 都在 package.json 下兩層
  const raw = fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
  return manifestSchema.parse(JSON.parse(raw)).version;
}
