export interface StatsSnapshot {
  startedAt: string;
  uptimeSeconds: number;
  authSucceeded: number;
  authFailed: number;
  sendRequests: number;
  messagesSent: number;
  messagesFailed: number;
}

/** Lifetime counters shown on the dashboard. Reset only by restarting the process. */
export class StatsService {
  private readonly startedAt: number;
  private authSucceeded = 0;
  private authFailed = 0;
  private sendRequests = 0;
  private messagesSent = 0;
  private messagesFailed = 0;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  recordAuth(success: boolean): void {
    if (success) this.authSucceeded++;
    else this.authFailed++;
  }

  recordSend(sent: number, failed: number): void {
    this.sendRequests++;
    this.messagesSent += sent;
    this.messagesFailed += failed;
  }

  snapshot(): StatsSnapshot {
    return {
      startedAt: new Date(this.startedAt).toISOString(),
      uptimeSeconds: Math.floor((this.now() - this.startedAt) / 1000),
      authSucceeded: this.authSucceeded,
      authFailed: this.authFailed,
      sendRequests: this.sendRequests,
      messagesSent: this.messagesSent,
      messagesFailed: this.messagesFailed,
    };
  }
}
