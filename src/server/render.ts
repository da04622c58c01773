import { html } from 'hono/html';
import type { ConnectionTable } from './registry';

export interface ConnectionsPage {
  time: string;
  uptime: string;
  listeners: string;
  table: ConnectionTable;
}

export function formatUptime(seconds: number): string {
  let rest = Math.max(0, Math.floor(seconds));
  const parts: string[] = [];
  for (const [unit, size] of [
    ['d', 86_400],
    ['h', 3_600],
    ['m', 60],
  ] as const) {
    const value = Math.floor(rest / size);
    rest -= value * size;
    if (value > 0 || parts.length > 0) {
      parts.push(`${value}${unit}`);
    }
  }
  parts.push(`${rest}s`);
  return parts.join(' ');
}

const STYLE = `
  body { font-family: sans-serif; }
  h3 { margin: 20px 0 10px; }
  table { border-collapse: collapse; }
  th { background-color: #fffddd; border: 1px solid #cccccc; padding: 6px 13px; }
  td { border: 1px solid #cccccc; padding: 6px 13px; text-align: center; }
  tr:nth-child(2n) { background-color: #eeffee; }
  td.subscriptions { text-align: left; width: 700px; white-space: pre-wrap; }
`;

export function renderConnections(page: ConnectionsPage) {
  const rows = page.table.rows.map(
    (row) => html`<tr>
        <td>${row.username}</td>
        <td>${row.clientId}</td>
        <td>${row.remote}</td>
        <td>${row.protocolVersion}</td>
        <td>${row.listener}</td>
        <td>${row.subscriptionCount}</td>
        <td class="subscriptions">${row.subscriptions}</td>
      </tr>`,
  );
  return html`<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta http-equiv="refresh" content="180" />
    <title>Broker Information</title>
    <style>${STYLE}</style>
  </head>
  <body>
    <h3>Current Time:</h3><a>${page.time}</a>
    <h3>Uptime</h3><a>${page.uptime}</a>
    <h3>Listeners:</h3><a>${page.listeners}</a>
    <h3>Clients</h3><a>${page.table.counts}</a>
    <table>
      <thead>
        <tr>
          <th>Client User</th>
          <th>Client ID</th>
          <th>Client IP</th>
          <th>Client Ver</th>
          <th>Protocol</th>
          <th>Subscribes</th>
          <th>Subscribe Detail</th>
        </tr>
      </thead>
      <tbody>
        ${rows}
      </tbody>
    </table>
  </body>
</html>`;
}
