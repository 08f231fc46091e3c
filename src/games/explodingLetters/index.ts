/**
 * Exploding Letters
 *
 * Every key press puts the key's letter on screen in big block type, at a
 * random spot, with a firework burst. Letters fade after a few seconds.
 */

import type { Observable } from 'rxjs';
import type { GameController } from '../gameManager';
import type { InputEvent } from '../../platform/inputEvents';
import type { PointerSurface } from '../../platform/surface';
import type { GameTerminal } from '../../platform/terminal';
import { getPalette } from '../../themes';
import { getCurrentThemeColor, getTheme, moveTo, randomPaletteColor } from '../utils';
import { renderParticles, spawnFirework, updateParticles, type Particle } from '../shared/effects';
import {
  displayCharacter,
  isExpired,
  letterCenter,
  placeLetter,
  LETTER_BRIGHT_MS,
  type LetterEntity,
} from './letters';

const FRAME_MS = 50;
const MAX_LETTERS = 12;

export function runExplodingLettersGame(
  terminal: GameTerminal,
  input$: Observable<InputEvent>,
  _surface: PointerSurface,
): GameController {
  const themeColor = getCurrentThemeColor();

  // -------------------------------------------------------------------------
  // STATE
  // -------------------------------------------------------------------------
  let running = true;
  let letters: LetterEntity[] = [];
  const particles: Particle[] = [];
  let pressCount = 0;

  // -------------------------------------------------------------------------
  // INPUT
  // -------------------------------------------------------------------------
  const subscription = input$.subscribe(event => {
    if (!running || event.kind !== 'key' || !event.isDown) return;

    const char = displayCharacter(event.key);
    if (char === null) return;

    const letter = placeLetter(char, terminal.cols, terminal.rows, randomPaletteColor(), Date.now());
    letters.push(letter);
    if (letters.length > MAX_LETTERS) {
      letters = letters.slice(-MAX_LETTERS);
    }
    const { x, y } = letterCenter(letter);
    spawnFirework(particles, x, y, getPalette(getTheme()));
    pressCount++;
  });

  // -------------------------------------------------------------------------
  // RENDER
  // -------------------------------------------------------------------------
  function render() {
    const now = Date.now();
    letters = letters.filter(letter => !isExpired(letter, now));
    updateParticles(particles, 0.5);

    const cols = terminal.cols;
    const rows = terminal.rows;
    let output = '\x1b[2J\x1b[H';

    if (letters.length === 0 && particles.length === 0) {
      const hint = pressCount === 0 ? 'Press any key!' : 'Press another key!';
      output += `${moveTo(Math.floor(rows / 2), Math.max(1, Math.floor((cols - hint.length) / 2)))}${themeColor}${hint}\x1b[0m`;
    }

    for (const letter of letters) {
      const weight = now - letter.createdAt < LETTER_BRIGHT_MS ? '\x1b[1m' : '\x1b[2m';
      letter.rows.forEach((line, i) => {
        const row = letter.row + i;
        if (row >= 1 && row <= rows) {
          output += `${moveTo(row, letter.col)}${weight}${letter.color}${line}\x1b[0m`;
        }
      });
    }

    output += renderParticles(particles, cols, rows);
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
    },
    get isRunning() { return running; },
  };
}
