/** 把擷取結果排成「key: value」區塊，供 LLM client 閱讀 */
export function formatRecords(items: ReadonlyArray<Record<string, string>>, emptyText: string): string {
  if (items.length === 0) return emptyText;
  return items
    .map((item, i) => {
      const fields = Object.entries(item)
        .filter(([, value]) => value !== '')
        .map(([key, value]) => `  ${key}: ${value}`);
      return [`[${i + 1}]`, ...fields].join('\n');
    })
    .join('\n');
}
