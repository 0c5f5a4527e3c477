import type { DocumentConfig, PortalConfig, SectionConfig } from '../../config/types.js';

export interface ResolvedSection {
  key: string;
  section: SectionConfig;
}

/** 以 key 或別名（不分大小寫）找出區塊 */
export function resolveSection(portal: PortalConfig, name: string): ResolvedSection | undefined {
  const wanted = name.trim().toLowerCase();
  for (const [key, section] of Object.entries(portal.sections)) {
    if (key.toLowerCase() === wanted) return { key, section };
    if (section.aliases.some((alias) => alias.toLowerCase() === wanted)) return { key, section };
  }
  return undefined;
}

/** 文件目錄查詢；不存在時回傳 undefined */
export function findDocument(portal: PortalConfig, documentType: string): DocumentConfig | undefined {
  return Object.prototype.hasOwnProperty.call(portal.documents, documentType)
    ? portal.documents[documentType]
    : undefined;
}

export function sectionNames(portal: PortalConfig): string[] {
  return Object.entries(portal.sections).flatMap(([key, s]) => [key, ...s.aliases]);
}
