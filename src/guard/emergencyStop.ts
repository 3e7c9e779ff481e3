export interface EmergencyContext {
  reason: string;
  cycleStartBalance: number;
  balance: number;
  equity: number;
  threshold: number | null;
  triggeredAt: string;
}

/**
 * One-shot latch for the equity-reduction breaker. Once tripped it stays
 * tripped until acknowledged, so repeated breaches inside the same incident
 * never flatten twice.
 */
export class EmergencyStop {
  private context: EmergencyContext | null = null;

  getContext(): EmergencyContext | null {
    return this.context ? { ...this.context } : null;
  }

  /** Returns true only for the call that actually trips the latch. */
  activate(context: EmergencyContext): boolean {
    if (this.context) return false;
    this.context = { ...context };
    return true;
  }

  acknowledge(): EmergencyContext | null {
    const previous = this.context;
    this.context = null;
    return previous;
  }
}
