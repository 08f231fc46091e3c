/**
 * Mouse Visualizer
 *
 * Draws a fading trail behind the pointer, a ripple at every click and
 * LEFT / MIDDLE / RIGHT lamps for the buttons being held.
 */

import type { Observable } from 'rxjs';
import type { GameController } from '../gameManager';
import type { InputEvent } from '../../platform/inputEvents';
import type { PointerSurface } from '../../platform/surface';
import type { GameTerminal } from '../../platform/terminal';
import { getCurrentThemeColor, getSubtleBackgroundColor, moveTo, randomPaletteColor } from '../utils';
import { renderParticles, spawnParticles, updateParticles, type Particle } from '../shared/effects';
import {
  applyButton,
  createButtonState,
  isRippleDone,
  PointerTrail,
  rippleRadius,
  ringCells,
  type ButtonState,
  type Ripple,
} from './pointer';

const FRAME_MS = 40;

const BUTTON_LABELS: Array<[keyof ButtonState, string]> = [
  ['left', 'LEFT'],
  ['middle', 'MIDDLE'],
  ['right', 'RIGHT'],
];

export function runMouseVisualizerGame(
  terminal: GameTerminal,
  input$: Observable<InputEvent>,
  surface: PointerSurface,
): GameController {
  const themeColor = getCurrentThemeColor();
  const subtle = getSubtleBackgroundColor();

  let running = true;
  const trail = new PointerTrail();
  let ripples: Ripple[] = [];
  const particles: Particle[] = [];
  const buttons = createButtonState();

  const subscription = input$.subscribe(event => {
    if (!running) return;

    switch (event.kind) {
      case 'motion':
        trail.add(surface.toCell(event.x, event.y));
        return;
      case 'button': {
        const cell = surface.toCell(event.x, event.y);
        applyButton(buttons, event.button, event.isDown);
        trail.add(cell);
        if (event.isDown) {
          const color = randomPaletteColor();
          ripples.push({ center: cell, color, startedAt: Date.now() });
          spawnParticles(particles, cell.col, cell.row, 6, color);
        }
        return;
      }
      case 'scroll': {
        const head = trail.head;
        if (head) {
          spawnParticles(particles, head.col, head.row, 3, randomPaletteColor());
        }
        return;
      }
      case 'key':
        return;
    }
  });

  function renderButtons(cols: number): string {
    const parts = BUTTON_LABELS.map(([button, label]) =>
      buttons[button] ? `\x1b[1;7m${themeColor} ${label} \x1b[0m` : `${subtle} ${label} \x1b[0m`,
    );
    const width = BUTTON_LABELS.reduce((sum, [, label]) => sum + label.length + 2, 0) + 2 * (BUTTON_LABELS.length - 1);
    return moveTo(2, Math.max(1, Math.floor((cols - width) / 2) + 1)) + parts.join('  ');
  }

  function render() {
    const now = Date.now();
    const cols = terminal.cols;
    const rows = terminal.rows;
    ripples = ripples.filter(ripple => !isRippleDone(ripple, now));
    updateParticles(particles, 0.3);

    let output = '\x1b[2J\x1b[H';

    if (trail.length === 0) {
      const hint = 'Move the mouse!';
      output += `${moveTo(Math.floor(rows / 2), Math.max(1, Math.floor((cols - hint.length) / 2)))}${themeColor}${hint}\x1b[0m`;
    }

    for (const ripple of ripples) {
      for (const cell of ringCells(ripple.center, rippleRadius(ripple, now))) {
        if (cell.col < 1 || cell.col > cols || cell.row < 1 || cell.row > rows) continue;
        output += `${moveTo(cell.row, cell.col)}${ripple.color}○\x1b[0m`;
      }
    }

    for (const point of trail.entries()) {
      output += `${moveTo(point.row, point.col)}${themeColor}${point.char}\x1b[0m`;
    }

    output += renderParticles(particles, cols, rows);
    output += renderButtons(cols);
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
      trail.clear();
    },
    get isRunning() { return running; },
  };
}
