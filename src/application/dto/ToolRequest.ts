/** 一次 tool 呼叫；dispatch 後不可變 */
export interface ToolRequest {
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  /** 用於 log / audit 關聯 */
  readonly requestId: string;
}
