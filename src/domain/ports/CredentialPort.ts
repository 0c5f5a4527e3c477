import type { PortalCredentials } from '../entities/PortalCredentials.js';

/** 唯讀憑證來源 */
export interface CredentialPort {
  /** 缺少帳號或密碼時拋出 CredentialsMissingError */
  resolve(): PortalCredentials;
  /** LLM planner 用的 API key（可選） */
  apiKey(): string | undefined;
}
