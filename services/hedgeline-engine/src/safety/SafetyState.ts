/**
 * Process-wide safety flags shared by the orchestrator and the watchdog.
 *
 * The emergency and shutdown flags only ever go from false to true.
 */
export class SafetyState {
  private consecutiveFailures = 0;
  private emergency = false;
  private shutdown = false;
  private readonly monitored = new Set<string>();
  private readonly inFlight = new Map<string, number>();

  constructor(private readonly maxConsecutiveFailures: number = 3) {
    if (!Number.isInteger(maxConsecutiveFailures) || maxConsecutiveFailures < 1) {
      throw new Error('maxConsecutiveFailures must be a positive integer');
    }
  }

  get failureCount(): number {
    return this.consecutiveFailures;
  }

  get failureCeiling(): number {
    return this.maxConsecutiveFailures;
  }

  get emergencyTriggered(): boolean {
    return this.emergency;
  }

  get shutdownRequested(): boolean {
    return this.shutdown;
  }

  /**
   * @returns true once the ceiling is reached
   */
  recordFailure(): boolean {
    this.consecutiveFailures += 1;
    if (this.consecutiveFailures >= this.maxConsecutiveFailures) {
      this.emergency = true;
      return true;
    }
    return false;
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
  }

  triggerEmergency(): void {
    this.emergency = true;
  }

  requestShutdown(): void {
    this.shutdown = true;
  }

  addMonitoredToken(token: string): void {
    this.monitored.add(token);
  }

  removeMonitoredToken(token: string): void {
    this.monitored.delete(token);
  }

  monitoredTokens(): string[] {
    return [...this.monitored];
  }

  beginAtomicAction(token: string): void {
    this.inFlight.set(token, (this.inFlight.get(token) ?? 0) + 1);
  }

  endAtomicAction(token: string): void {
    const count = this.inFlight.get(token) ?? 0;
    if (count <= 1) {
      this.inFlight.delete(token);
    } else {
      this.inFlight.set(token, count - 1);
    }
  }

  isAtomicActionInFlight(token: string): boolean {
    return this.inFlight.has(token);
  }
}
