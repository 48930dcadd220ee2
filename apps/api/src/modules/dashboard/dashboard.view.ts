import type { PublicPreferences, StatusResponse, TargetSummary } from '@vampgotchi/common';

import { escapeHtml } from '../../shared/http/html.js';

export interface DashboardView {
  status: StatusResponse;
  preferences: PublicPreferences;
  /** One-line result of the command that produced this page. */
  notice?: string;
}

const STATUS_POLL_MS = 2000;

const targetRow = ({ mac, name, rssi }: TargetSummary, selected: string) => `
        <tr${mac === selected ? ' class="selected"' : ''}>
          <td>${escapeHtml(name)}</td>
          <td><code>${escapeHtml(mac)}</code></td>
          <td>${rssi} dBm</td>
          <td>
            <form method="post" action="/attack">
              <input type="hidden" name="mac" value="${escapeHtml(mac)}">
              <button type="submit">Attack</button>
            </form>
          </td>
        </tr>`;

const option = (value: string, current: string) =>
  `<option value="${value}"${value === current ? ' selected' : ''}>${value}</option>`;

// Runs in the browser. Rebuilds the dynamic parts from /api/status with
// textContent only.
const pollScript = `
(() => {
  const byId = (id) => document.getElementById(id);
  const setText = (id, value) => { const el = byId(id); if (el) el.textContent = String(value); };

  const attackCell = (mac) => {
    const form = document.createElement('form');
    form.method = 'post';
    form.action = '/attack';
    const input = document.createElement('input');
    input.type = 'hidden';
    input.name = 'mac';
    input.value = mac;
    const button = document.createElement('button');
    button.type = 'submit';
    button.textContent = 'Attack';
    form.append(input, button);
    const cell = document.createElement('td');
    cell.append(form);
    return cell;
  };

  const renderTargets = (status) => {
    const body = byId('targets');
    if (!body) return;
    body.replaceChildren();
    for (const target of status.targetsInfo) {
      const row = document.createElement('tr');
      if (target.mac === status.selectedTarget) row.className = 'selected';
      const name = document.createElement('td');
      name.textContent = target.name;
      const mac = document.createElement('td');
      const code = document.createElement('code');
      code.textContent = target.mac;
      mac.append(code);
      const rssi = document.createElement('td');
      rssi.textContent = target.rssi + ' dBm';
      row.append(name, mac, rssi, attackCell(target.mac));
      body.append(row);
    }
  };

  const refresh = async () => {
    try {
      const response = await fetch('/api/status', { cache: 'no-store' });
      if (!response.ok) return;
      const status = await response.json();
      const statusEl = byId('status-text');
      if (statusEl) {
        statusEl.textContent = status.statusText;
        statusEl.className = 'status ' + status.statusClass;
      }
      setText('mood', status.stats.mood);
      setText('count', status.count);
      setText('total-scans', status.stats.totalScans);
      setText('total-attacks', status.stats.totalAttacks);
      setText('unique-targets', status.stats.uniqueTargets);
      setText('uptime', status.stats.uptime);
      setText('network-mode', status.network.mode);
      setText('network-ip', status.network.ip);
      setText('network-switch', status.network.switch.state);
      setText('hunger', status.pet.hunger);
      setText('blood', status.pet.blood);
      setText('level', status.pet.level);
      setText('exp', status.pet.exp + '/' + status.pet.expToNext);
      setText('money', status.pet.money);
      setText('coffin', status.pet.coffin);
      setText('activity', status.pet.activity.join('\\n'));
      renderTargets(status);
    } catch (error) {
      console.warn('Status refresh failed', error);
    }
  };

  setInterval(refresh, ${STATUS_POLL_MS});
})();
`;

export const renderDashboard = ({ status, preferences, notice }: DashboardView): string => {
  const { stats, pet, network } = status;
  const switchFailures = network.switch.failures.map((failure) => `<li>${escapeHtml(failure)}</li>`).join('');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>VampGotchi</title>
  <style>
    body { font-family: monospace; background: #120a14; color: #e8dcec; margin: 0; padding: 16px; }
    main { max-width: 720px; margin: 0 auto; }
    h1 { color: #d64566; margin: 0 0 12px; }
    section { border: 1px solid #3a2340; border-radius: 8px; padding: 12px; margin-bottom: 12px; }
    h2 { font-size: 0.9rem; text-transform: uppercase; color: #b98ac4; margin: 0 0 8px; }
    .status { font-weight: bold; }
    .status.scanning { color: #e0b341; }
    .status.attacking { color: #ff4f6d; }
    .notice { background: #2b1730; padding: 8px; border-radius: 6px; }
    table { width: 100%; border-collapse: collapse; }
    td { padding: 4px; border-bottom: 1px solid #2b1730; }
    tr.selected { background: #2b1730; }
    form { display: inline; }
    button { background: #d64566; color: #fff; border: 0; border-radius: 4px; padding: 4px 10px; cursor: pointer; }
    input, select { background: #1d1020; color: inherit; border: 1px solid #3a2340; padding: 4px; }
    pre { white-space: pre-wrap; margin: 0; }
    summary { cursor: pointer; color: #b98ac4; }
    a { color: #e0b341; }
  </style>
</head>
<body>
<main>
  <h1>VampGotchi</h1>
  ${notice ? `<p class="notice">${escapeHtml(notice)}</p>` : ''}

  <section>
    <h2>Status</h2>
    <p><span id="status-text" class="status ${status.statusClass}">${escapeHtml(status.statusText)}</span>
      · mood <span id="mood">${stats.mood}</span> · up <span id="uptime">${escapeHtml(stats.uptime)}</span></p>
    <p>Targets <span id="count">${status.count}</span> · scans <span id="total-scans">${stats.totalScans}</span>
      · attacks <span id="total-attacks">${stats.totalAttacks}</span>
      · unique <span id="unique-targets">${stats.uniqueTargets}</span></p>
    <form method="post" action="/scan"><button type="submit">Scan</button></form>
    <form method="post" action="/stop"><button type="submit">Stop attack</button></form>
  </section>

  <section>
    <h2>Targets</h2>
    <table>
      <tbody id="targets">${status.targetsInfo.map((target) => targetRow(target, status.selectedTarget)).join('')}
      </tbody>
    </table>
  </section>

  <section>
    <h2>Pet</h2>
    <p>Hunger <span id="hunger">${pet.hunger}</span>/1000 · blood <span id="blood">${pet.blood}</span>%
      · level <span id="level">${pet.level}</span> · exp <span id="exp">${pet.exp}/${pet.expToNext}</span>
      · $<span id="money">${pet.money}</span> · coffin <span id="coffin">${pet.coffin}</span></p>
    <pre id="activity">${escapeHtml(pet.activity.join('\n'))}</pre>
  </section>

  <section>
    <h2>Network</h2>
    <p>Mode <span id="network-mode">${network.mode}</span> · IP <span id="network-ip">${escapeHtml(network.ip)}</span>
      · last switch <span id="network-switch">${network.switch.state}</span></p>
    ${switchFailures ? `<ul>${switchFailures}</ul>` : ''}
    <form method="post" action="/set_ap"><button type="submit">Access point</button></form>
    <form method="post" action="/set_client">
      <input name="ssid" placeholder="SSID" required>
      <input name="password" type="password" placeholder="Password" required>
      <button type="submit">Join network</button>
    </form>
  </section>

  <section>
    <h2>Display</h2>
    <form method="post" action="/api/config">
      <select name="displayMode">${option('black', preferences.displayMode)}${option('white', preferences.displayMode)}</select>
      <input name="displayFullRefreshInterval" type="number" min="1" value="${preferences.displayFullRefreshInterval}">
      <button type="submit">Save</button>
    </form>
  </section>

  <details>
    <summary>Debug</summary>
    <p><a href="/api/debug/scan">Last scan output</a> · <a href="/api/debug/bluetooth">Bluetooth adapter</a></p>
  </details>
</main>
<script>${pollScript}</script>
</body>
</html>
`;
};
