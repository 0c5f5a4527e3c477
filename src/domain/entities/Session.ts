import type { StudentProfile } from '../ports/BrowserPort.js';

export type SessionState = 'LoggedOut' | 'LoggingIn' | 'Active' | 'Degraded';

/** 對外可見的 session 狀態（不含憑證） */
export interface SessionSnapshot {
  state: SessionState;
  lastActivityAt?: number;
  consecutiveFailureCount: number;
  profile?: StudentProfile;
  currentUrl?: string;
}
