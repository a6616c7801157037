/* eslint-disable no-console */
import type { LearnerKind, TrainingStatus } from './app';

const STATUS_POLL_INTERVAL = 1500;

function requireElement<T extends HTMLElement>(id: string, type: { new (): T }): T {
  const element = document.getElementById(id);
  if (!(element instanceof type)) {
    throw new Error(`Missing element #${id}`);
  }
  return element;
}

const startButton = requireElement('start', HTMLButtonElement);
const stopButton = requireElement('stop', HTMLButtonElement);
const redKindSelect = requireElement('red-kind', HTMLSelectElement);
const stateLabel = requireElement('state', HTMLParagraphElement);
const statsBody = requireElement('stats', HTMLTableSectionElement);
const boardView = requireElement('board', HTMLPreElement);

// JSON turns non-finite numbers into null.
function formatParameters(parameters: ReadonlyArray<number | null>): string {
  return parameters
    .map((value) => (typeof value === 'number' && Number.isFinite(value) ? value.toFixed(3) : 'n/a'))
    .join(' ');
}

function renderStatus(status: TrainingStatus): void {
  stateLabel.textContent = status.running
    ? `training (cycle ${status.cycle}, red: ${status.redKind})`
    : `stopped (red: ${status.redKind})`;
  if (status.message) {
    stateLabel.textContent += ` - ${status.message}`;
  }
  const rows: Array<[string, string]> = [
    ['matches', String(status.matches)],
    ['white wins', String(status.whiteWins)],
    ['red wins', String(status.redWins)],
    ['draws', String(status.draws)],
    ['average moves', status.averageMoves.toFixed(1)],
    ['white parameters', formatParameters(status.parameters.white)],
    ['red parameters', formatParameters(status.parameters.red)],
    ['updated', status.updatedAt ?? '-'],
  ];
  statsBody.replaceChildren(
    ...rows.map(([label, value]) => {
      const row = document.createElement('tr');
      const labelCell = document.createElement('td');
      labelCell.textContent = label;
      const valueCell = document.createElement('td');
      valueCell.textContent = value;
      row.append(labelCell, valueCell);
      return row;
    }),
  );
  boardView.textContent = status.previewBoard.join('\n');
  startButton.disabled = status.running;
  stopButton.disabled = !status.running;
}

async function fetchStatus(): Promise<void> {
  const response = await fetch('/api/train/status');
  if (!response.ok) {
    throw new Error(`Status request failed: ${response.status}`);
  }
  const status: TrainingStatus = await response.json();
  renderStatus(status);
}

async function post(url: string, body: { red?: LearnerKind } = {}): Promise<void> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
  if (!response.ok) {
    throw new Error(`${url} failed: ${response.status}`);
  }
  await fetchStatus();
}

function selectedRedKind(): LearnerKind {
  return redKindSelect.value === 'replay' ? 'replay' : 'online';
}

startButton.addEventListener('click', () => {
  post('/api/train/start', { red: selectedRedKind() }).catch((error) => {
    console.error(error);
  });
});

stopButton.addEventListener('click', () => {
  post('/api/train/stop').catch((error) => {
    console.error(error);
  });
});

setInterval(() => {
  fetchStatus().catch((error) => {
    console.error(error);
  });
}, STATUS_POLL_INTERVAL);

fetchStatus().catch((error) => {
  console.error(error);
});
