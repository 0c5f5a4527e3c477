import type { CredentialPort } from '../../domain/ports/CredentialPort.js';
import { PortalCredentials } from '../../domain/entities/PortalCredentials.js';
import { CredentialsMissingError } from '../../domain/errors/DomainErrors.js';

/**
 * 從環境變數讀取憑證：PORTAL_USERNAME / PORTAL_PASSWORD，
 * LLM API key 為 PORTAL_LLM_API_KEY，其次 OPENAI_API_KEY。
 *
 * 每次 resolve 都重新讀取，不快取於記憶體。
 */
export class EnvCredentialStore implements CredentialPort {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  resolve(): PortalCredentials {
    const username = this.env.PORTAL_USERNAME?.trim();
    const password = this.env.PORTAL_PASSWORD;
    if (!username || !password) {
      throw new CredentialsMissingError();
    }
    return new PortalCredentials(username, password);
  }

  apiKey(): string | undefined {
    return this.env.PORTAL_LLM_API_KEY || this.env.OPENAI_API_KEY || undefined;
  }
}
