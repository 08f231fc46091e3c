/**
 * Keyboard Visualizer
 *
 * An on-screen keyboard whose keys light up while they are held, with a
 * small sparkle over each key as it goes down.
 */

import type { Observable } from 'rxjs';
import type { GameController } from '../gameManager';
import type { InputEvent } from '../../platform/inputEvents';
import type { PointerSurface } from '../../platform/surface';
import type { GameTerminal } from '../../platform/terminal';
import { getCurrentThemeColor, getSubtleBackgroundColor, getVerticalAnchor, moveTo, randomPaletteColor } from '../utils';
import { renderParticles, spawnSparkleTrail, updateParticles, type Particle } from '../shared/effects';
import { buildKeyCaps, HeldKeys, keyboardRows, keyboardWidth, type KeyCap } from './layout';

const FRAME_MS = 50;
/** Terminal rows per keyboard row (box top, label, box bottom) */
const CAP_HEIGHT = 3;

export function runKeyboardVisualizerGame(
  terminal: GameTerminal,
  input$: Observable<InputEvent>,
  _surface: PointerSurface,
): GameController {
  const themeColor = getCurrentThemeColor();
  const subtle = getSubtleBackgroundColor();
  const caps = buildKeyCaps();
  const width = keyboardWidth(caps);
  const height = keyboardRows(caps) * CAP_HEIGHT;

  let running = true;
  const held = new HeldKeys();
  const particles: Particle[] = [];
  const capColors = new Map<KeyCap, string>();
  let lastKey = '';

  function origin() {
    return {
      left: Math.max(1, Math.floor((terminal.cols - width) / 2) + 1),
      top: getVerticalAnchor(terminal.rows, height, { headerRows: 2, footerRows: 1 }),
    };
  }

  const subscription = input$.subscribe(event => {
    if (!running || event.kind !== 'key') return;

    if (!event.isDown) {
      held.release(event.key);
      return;
    }

    held.press(event.key, Date.now());
    lastKey = event.key === ' ' ? 'Space' : event.key;

    const { left, top } = origin();
    for (const cap of caps) {
      if (!cap.keys.includes(event.key)) continue;
      const color = randomPaletteColor();
      capColors.set(cap, color);
      spawnSparkleTrail(particles, left + cap.col + cap.width / 2, top + cap.row * CAP_HEIGHT, 4, color);
    }
  });

  function renderCap(cap: KeyCap, left: number, top: number, lit: boolean): string {
    const inner = Math.max(1, cap.width - 2);
    const label = [...cap.label].slice(0, inner).join('');
    const pad = inner - [...label].length;
    const padLeft = Math.floor(pad / 2);
    const color = lit ? `\x1b[1;7m${capColors.get(cap) ?? themeColor}` : subtle;
    const x = left + cap.col;
    const y = top + cap.row * CAP_HEIGHT;

    return `${moveTo(y, x)}${color}┌${'─'.repeat(inner)}┐\x1b[0m`
      + `${moveTo(y + 1, x)}${color}│${' '.repeat(padLeft)}${label}${' '.repeat(pad - padLeft)}│\x1b[0m`
      + `${moveTo(y + 2, x)}${color}└${'─'.repeat(inner)}┘\x1b[0m`;
  }

  function render() {
    const now = Date.now();
    updateParticles(particles, 0);
    const { left, top } = origin();

    let output = '\x1b[2J\x1b[H';
    const title = lastKey === '' ? 'Press any key!' : lastKey;
    output += `${moveTo(Math.max(1, top - 2), Math.max(1, Math.floor((terminal.cols - [...title].length) / 2) + 1))}\x1b[1m${themeColor}${title}\x1b[0m`;

    for (const cap of caps) {
      output += renderCap(cap, left, top, held.isLit(cap, now));
    }

    output += renderParticles(particles, terminal.cols, terminal.rows);
    terminal.write(output);
  }

  const renderInterval = setInterval(() => {
    if (!running) { clearInterval(renderInterval); return; }
    render();
  }, FRAME_MS);

  render();

  return {
    stop: () => {
      if (!running) return;
      running = false;
      clearInterval(renderInterval);
      subscription.unsubscribe();
      held.clear();
    },
    get isRunning() { return running; },
  };
}
