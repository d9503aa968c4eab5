// client/src/main.ts

import { FRAME_LEGEND, STRATEGIES, STRATEGY_LABELS } from '@maze-lab/engine';
import type { StrategyKey } from '@maze-lab/engine';

type SessionState = 'generating_maze' | 'choosing_strategy' | 'animating' | 'awaiting_next_step' | 'closed';

type ServerMsg =
  | { type: 'session'; payload: { state: SessionState } }
  | { type: 'maze'; payload: { width: number; height: number; seed: number | null; rows: string[] } }
  | { type: 'frame'; payload: { index: number; status: string; rows: string[] } }
  | { type: 'path'; payload: { cells: number[]; status: string; rows: string[]; stats: Record<string, number> } }
  | { type: 'unreachable'; payload: { message: string; rows: string[] } }
  | { type: 'action_result'; payload: { ok: boolean; reason?: string; seq: number } }
  | { type: 'error'; payload: { code: string; message: string } };

function byId<T extends HTMLElement>(id: string, ctor: { new (): T }): T {
  const el = document.getElementById(id);
  if (!(el instanceof ctor)) throw new Error(`missing #${id}`);
  return el;
}

const statusEl = byId('status', HTMLSpanElement);
const frameStatusEl = byId('frame-status', HTMLDivElement);
const mainEl = byId('main', HTMLPreElement);
const metaEl = byId('meta', HTMLPreElement);
const legendEl = byId('legend', HTMLPreElement);
const widthEl = byId('width', HTMLInputElement);
const heightEl = byId('height', HTMLInputElement);
const seedEl = byId('seed', HTMLInputElement);
const speedEl = byId('speed', HTMLInputElement);
const skipEl = byId('skip', HTMLInputElement);
const manualEl = byId('manual', HTMLInputElement);
const generateBtn = byId('generate', HTMLButtonElement);
const stepBtn = byId('step', HTMLButtonElement);
const sameBtn = byId('same', HTMLButtonElement);
const newBtn = byId('new', HTMLButtonElement);
const quitBtn = byId('quit', HTMLButtonElement);
const strategiesEl = byId('strategies', HTMLDivElement);

let ws: WebSocket | null = null;
let seq = 0;
let state: SessionState = 'generating_maze';

function setStatus(s: string) {
  statusEl.textContent = ` ${s}`;
}

function isServerMsg(v: unknown): v is ServerMsg {
  return !!v && typeof v === 'object' && 'type' in v && 'payload' in v;
}

function connect() {
  if (ws) ws.close();

  const wsProto = location.protocol === 'https:' ? 'wss:' : 'ws:';
  ws = new WebSocket(`${wsProto}//${location.host}/ws`);
  setStatus('connecting...');

  ws.onopen = () => setStatus('connected');

  ws.onmessage = (ev) => {
    const msg: unknown = JSON.parse(String(ev.data));
    if (!isServerMsg(msg)) return;

    switch (msg.type) {
      case 'session':
        state = msg.payload.state;
        setStatus(state.replace(/_/g, ' '));
        syncButtons();
        return;
      case 'maze':
        metaEl.textContent = `maze ${msg.payload.width}x${msg.payload.height} seed=${msg.payload.seed ?? '-'}`;
        draw('EMPTY MAZE - pick an algorithm', msg.payload.rows);
        return;
      case 'frame':
        draw(`#${msg.payload.index} ${msg.payload.status}`, msg.payload.rows);
        return;
      case 'path':
        draw(msg.payload.status, msg.payload.rows);
        metaEl.textContent = JSON.stringify({ length: msg.payload.cells.length, ...msg.payload.stats }, null, 2);
        return;
      case 'unreachable':
        draw(msg.payload.message, msg.payload.rows);
        return;
      case 'action_result':
        if (!msg.payload.ok) setStatus(`rejected: ${msg.payload.reason ?? 'unknown'}`);
        return;
      case 'error':
        setStatus(`error ${msg.payload.code}: ${msg.payload.message}`);
        return;
    }
  };

  ws.onclose = (ev) => setStatus(`ws closed (code=${ev.code})`);
  ws.onerror = () => setStatus('ws error');
}

function send(type: string, payload: Record<string, unknown> = {}) {
  if (!ws || ws.readyState !== WebSocket.OPEN) return;
  ws.send(JSON.stringify({ seq: seq++, type, payload }));
}

function draw(status: string, rows: string[]) {
  frameStatusEl.textContent = status;
  mainEl.textContent = rows.join('\n');
}

function optionalInt(el: HTMLInputElement): number | undefined {
  const v = el.value.trim();
  if (!v) return undefined;
  const n = Number(v);
  return Number.isInteger(n) ? n : undefined;
}

function syncButtons() {
  const canGenerate = state === 'generating_maze' || state === 'choosing_strategy' || state === 'awaiting_next_step';
  generateBtn.disabled = !canGenerate;
  for (const b of Array.from(strategiesEl.querySelectorAll('button'))) b.disabled = state !== 'choosing_strategy';
  stepBtn.disabled = state !== 'animating';
  sameBtn.disabled = state !== 'awaiting_next_step';
  newBtn.disabled = state !== 'awaiting_next_step';
  quitBtn.disabled = state === 'closed';
}

function runStrategy(strategy: StrategyKey) {
  send('run', {
    strategy,
    speed: optionalInt(speedEl),
    skip_animation: skipEl.checked,
    manual: manualEl.checked
  });
}

for (const key of STRATEGIES) {
  const b = document.createElement('button');
  b.textContent = STRATEGY_LABELS[key];
  b.addEventListener('click', () => runStrategy(key));
  strategiesEl.appendChild(b);
}

legendEl.textContent = FRAME_LEGEND.map((l) => `${l.glyph} : ${l.meaning}`).join('\n');

generateBtn.addEventListener('click', () => {
  send('generate', { width: optionalInt(widthEl), height: optionalInt(heightEl), seed: optionalInt(seedEl) });
});
stepBtn.addEventListener('click', () => send('step'));
sameBtn.addEventListener('click', () => send('next', { choice: 'same' }));
newBtn.addEventListener('click', () => send('next', { choice: 'new' }));
quitBtn.addEventListener('click', () => send('quit'));

// Enter advances a manual run
window.addEventListener('keydown', (ev) => {
  if (ev.key === 'Enter' && state === 'animating' && manualEl.checked) {
    ev.preventDefault();
    send('step');
  }
});

syncButtons();
connect();
