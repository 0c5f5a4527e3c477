import type { ExtractedRecord, PageSnapshot } from './BrowserPort.js';

/**
 * LLM planner 抽象介面
 *
 * custom task 的自由文字目標交給 planner；planner 只能透過 toolbox
 * 操作目前已登入的瀏覽器，與其他 tool 共用同一個逾時 / 重試 / 錯誤對應。
 */

export interface PlannerContext {
  portalBaseUrl: string;
  currentUrl?: string;
  /** 可用區塊（key + 標題） */
  sections: Array<{ key: string; title: string }>;
}

/** planner 可呼叫的瀏覽器動作 */
export interface PlannerToolbox {
  openSection(key: string): Promise<PageSnapshot>;
  extractSection(key: string): Promise<ExtractedRecord>;
  readPage(): Promise<PageSnapshot>;
}

export interface PlanOptions {
  maxSteps: number;
  returnStructuredData: boolean;
  signal?: AbortSignal;
}

export interface PlanStep {
  action: string;
  detail: string;
}

export interface PlanResult {
  /** planner 是否在步數上限內宣告完成 */
  completed: boolean;
  summary: string;
  data?: unknown;
  steps: PlanStep[];
}

export interface PlannerPort {
  readonly providerId: string;
  plan(
    goal: string,
    context: PlannerContext,
    toolbox: PlannerToolbox,
    options: PlanOptions,
  ): Promise<PlanResult>;
}
