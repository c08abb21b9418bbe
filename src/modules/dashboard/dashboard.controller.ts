import { Request, Response } from 'express';
import type { StatsService, StatsSnapshot } from '../../services/stats.service';
import type { TokenStore } from '../../services/token-store.service';

interface DashboardView extends StatsSnapshot {
  activeTokens: number;
}

function renderHtml(view: DashboardView): string {
  const rows: Array<[string, string | number]> = [
    ['Started', view.startedAt],
    ['Uptime (s)', view.uptimeSeconds],
    ['Successful logins', view.authSucceeded],
    ['Failed logins', view.authFailed],
    ['Active tokens', view.activeTokens],
    ['Send requests', view.sendRequests],
    ['Messages sent', view.messagesSent],
    ['Messages failed', view.messagesFailed],
  ];
  const body = rows.map(([label, value]) => `<tr><th>${label}</th><td>${value}</td></tr>`).join('');
  return `<!DOCTYPE html>
<html>
  <head><meta charset="utf-8"><title>SMTP Relay</title>
  <style>body{font-family:sans-serif;margin:40px}th{text-align:left;padding-right:24px}</style></head>
  <body>
    <h1>SMTP Relay</h1>
    <p>POST /auth with your Gmail address and app password, then POST /send with the token in X-Token.</p>
    <table>${body}</table>
  </body>
</html>`;
}

export function createDashboardController(stats: StatsService, tokens: TokenStore) {
  return {
    show(_req: Request, res: Response): void {
      const view: DashboardView = { ...stats.snapshot(), activeTokens: tokens.size() };
      res.format({
        'application/json': () => {
          res.json({
            started_at: view.startedAt,
            uptime_seconds: view.uptimeSeconds,
            auth_succeeded: view.authSucceeded,
            auth_failed: view.authFailed,
            active_tokens: view.activeTokens,
            send_requests: view.sendRequests,
            messages_sent: view.messagesSent,
            messages_failed: view.messagesFailed,
          });
        },
        'text/html': () => {
          res.send(renderHtml(view));
        },
      });
    },
  };
}
