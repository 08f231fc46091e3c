/**
 * Games
 *
 * Presentation-only games for the kiosk. Each one subscribes to the shared
 * input stream and draws full frames to the terminal it is given.
 *
 * Usage:
 * 1. Set the theme: setTheme('rainbow')
 * 2. Register the games: games.forEach(g => manager.register(g))
 * 3. Start one: manager.switchGame('exploding-letters')
 */

// Re-export utilities
export {
  setTheme,
  getTheme,
  getCurrentThemeColor,
  getSubtleBackgroundColor,
  getVerticalAnchor,
  randomPaletteColor,
} from './utils';

export type { ThemeMode } from './utils';

// Re-export transitions
export { playBootTransition, playExitTransition } from './gameTransitions';

export { GameManager } from './gameManager';
export type { GameController, GameInfo, GameManagerOptions } from './gameManager';

// Import game modules
import { runExplodingLettersGame } from './explodingLetters';
import { runKeyboardVisualizerGame } from './keyboardVisualizer';
import { runMouseVisualizerGame } from './mouseVisualizer';
import type { GameInfo } from './gameManager';

export const games: GameInfo[] = [
  { id: 'exploding-letters', name: 'Letters', description: 'Big letters pop with every key', run: runExplodingLettersGame },
  { id: 'keyboard-visualizer', name: 'Keyboard', description: 'Watch the keys light up', run: runKeyboardVisualizerGame },
  { id: 'mouse-visualizer', name: 'Mouse', description: 'Trails and ripples follow the mouse', run: runMouseVisualizerGame },
];

export const DEFAULT_GAME_ID = 'exploding-letters';

/**
 * Get a game by ID or (case-insensitive) name
 */
export function getGame(idOrName: string): GameInfo | undefined {
  const wanted = idOrName.toLowerCase();
  return games.find(g => g.id === wanted || g.name.toLowerCase() === wanted);
}

// Also export individual game runners for direct imports
export {
  runExplodingLettersGame,
  runKeyboardVisualizerGame,
  runMouseVisualizerGame,
};

// Re-export shared game effects
export {
  spawnParticles,
  spawnFirework,
  spawnSparkleTrail,
  updateParticles,
  renderParticles,
  MAX_PARTICLES,
  PARTICLE_CHARS,
} from './shared/effects';

export type { Particle } from './shared/effects';
