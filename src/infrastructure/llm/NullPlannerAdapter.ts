import type { PlannerPort, PlanResult } from '../../domain/ports/PlannerPort.js';
import { PlannerUnavailableError } from '../../domain/errors/DomainErrors.js';

/**
 * 未設定 LLM 時的 planner
 * custom task 一律回報 PlannerUnavailableError（InvalidRequest）。
 */
export class NullPlannerAdapter implements PlannerPort {
  readonly providerId = 'none';

  async plan(): Promise<PlanResult> {
    throw new PlannerUnavailableError();
  }
}
