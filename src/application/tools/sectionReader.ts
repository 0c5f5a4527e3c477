import { ResourceNotFoundError } from '../../domain/errors/DomainErrors.js';
import type { ExtractedRecord } from '../../domain/ports/BrowserPort.js';
import type { OperationContext } from './ToolDefinition.js';

/** 開啟目錄中的固定區塊並擷取 */
export async function readSection(ctx: OperationContext, key: string): Promise<ExtractedRecord> {
  const section = Object.prototype.hasOwnProperty.call(ctx.portal.sections, key)
    ? ctx.portal.sections[key]
    : undefined;
  if (!section) {
    throw new ResourceNotFoundError(`The portal catalog has no "${key}" section`);
  }
  await ctx.browser.navigate({ path: section.path });
  return ctx.browser.extract(section.extract);
}
