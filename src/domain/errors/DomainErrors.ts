/** 對外穩定的錯誤分類 */
export type FailureKind =
  | 'InvalidRequest'
  | 'AuthenticationFailed'
  | 'SessionUnrecoverable'
  | 'Timeout'
  | 'NotFound'
  | 'Disconnected'
  | 'Unknown';

export type ErrorClassification = 'retryable' | 'degradable' | 'manual';

/** 所有 portal domain 錯誤的基底類別 */
export abstract class PortalError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;
  abstract readonly kind: FailureKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Retryable（Dispatcher 內部重試） ---

export class BrowserTimeoutError extends PortalError {
  readonly classification = 'retryable' as const;
  readonly code = 'ENGINE_TIMED_OUT';
  readonly kind = 'Timeout' as const;
}

export class BrowserDisconnectedError extends PortalError {
  readonly classification = 'retryable' as const;
  readonly code = 'ENGINE_DISCONNECTED';
  readonly kind = 'Disconnected' as const;
}

export class PlannerTransientError extends PortalError {
  readonly classification = 'retryable' as const;
  readonly code = 'PLANNER_TRANSIENT';
  readonly kind = 'Disconnected' as const;
}

// --- Degradable（觸發重新登入） ---

export class SessionExpiredError extends PortalError {
  readonly classification = 'degradable' as const;
  readonly code = 'SESSION_EXPIRED';
  readonly kind = 'SessionUnrecoverable' as const;
}

// --- Manual ---

export class InvalidToolRequestError extends PortalError {
  readonly classification = 'manual' as const;
  readonly code = 'INVALID_REQUEST';
  readonly kind = 'InvalidRequest' as const;

  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: ErrorOptions,
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
  }
}

export class AuthenticationFailedError extends PortalError {
  readonly classification = 'manual' as const;
  readonly code = 'AUTH_REJECTED';
  readonly kind = 'AuthenticationFailed' as const;
}

export class LoginChallengeError extends PortalError {
  readonly classification = 'manual' as const;
  readonly code = 'AUTH_CHALLENGE';
  readonly kind = 'AuthenticationFailed' as const;

  constructor(
    public readonly challenge: 'captcha' | 'two-factor',
    options?: ErrorOptions,
  ) {
    super(
      challenge === 'captcha'
        ? 'Portal requested a CAPTCHA; complete the login manually and retry'
        : 'Portal requested a two-factor code; complete the login manually and retry',
      options,
    );
  }
}

export class CredentialsMissingError extends PortalError {
  readonly classification = 'manual' as const;
  readonly code = 'CREDENTIALS_MISSING';
  readonly kind = 'AuthenticationFailed' as const;

  constructor(options?: ErrorOptions) {
    super('Portal credentials are not configured. Set PORTAL_USERNAME and PORTAL_PASSWORD', options);
  }
}

export class SessionUnrecoverableError extends PortalError {
  readonly classification = 'manual' as const;
  readonly code = 'SESSION_UNRECOVERABLE';
  readonly kind = 'SessionUnrecoverable' as const;
}

export class ResourceNotFoundError extends PortalError {
  readonly classification = 'manual' as const;
  readonly code = 'NOT_FOUND';
  readonly kind = 'NotFound' as const;
}

export class DispatchTimeoutError extends PortalError {
  readonly classification = 'manual' as const;
  readonly code = 'DISPATCH_TIMEOUT';
  readonly kind = 'Timeout' as const;

  constructor(
    public readonly toolName: string,
    public readonly budgetMs: number,
    options?: ErrorOptions,
  ) {
    super(`Tool "${toolName}" did not finish within ${budgetMs}ms`, options);
  }
}

export class PlannerUnavailableError extends PortalError {
  readonly classification = 'manual' as const;
  readonly code = 'PLANNER_UNAVAILABLE';
  readonly kind = 'InvalidRequest' as const;

  constructor(options?: ErrorOptions) {
    super('Custom tasks need an LLM provider. Set llm.provider and PORTAL_LLM_API_KEY', options);
  }
}

/** 狀態機內部錯誤，不應發生；對外一律呈現為 Unknown */
export class IllegalTransitionError extends PortalError {
  readonly classification = 'manual' as const;
  readonly code = 'ILLEGAL_TRANSITION';
  readonly kind = 'Unknown' as const;

  constructor(
    public readonly from: string,
    public readonly to: string,
    options?: ErrorOptions,
  ) {
    super(`Illegal session transition ${from} -> ${to}`, options);
  }
}

/** Dispatcher 內部可重試的錯誤 */
export function isTransient(err: unknown): boolean {
  return err instanceof PortalError && err.classification === 'retryable';
}

/** log 用的錯誤代碼（不含訊息，避免帶出頁面內容） */
export function errorCode(err: unknown): string {
  if (err instanceof PortalError) return err.code;
  return err instanceof Error ? err.name : 'unknown';
}
