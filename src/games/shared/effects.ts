/**
 * Shared Visual Effects
 *
 * Particle bursts used by every game. Positions are in terminal cells
 * (fractional while in flight, rounded when drawn).
 */

import { moveTo } from '../utils';

// ============================================================================
// TYPES
// ============================================================================

export interface Particle {
  x: number;
  y: number;
  char: string;
  color: string;
  vx: number;
  vy: number;
  life: number;
}

export type RandomSource = () => number;

// ============================================================================
// CONSTANTS
// ============================================================================

/** Maximum particles to prevent performance issues */
export const MAX_PARTICLES = 150;

/** Common particle character sets */
export const PARTICLE_CHARS = {
  burst: ['✦', '★', '◆', '●'],
  firework: ['★', '✦', '◆', '●', '✶', '✴', '◇', '♦', '•', '○'],
  sparkle: ['✦', '✧', '★'],
} as const;

function pick<T>(items: readonly T[], random: RandomSource): T | undefined {
  return items[Math.floor(random() * items.length)];
}

// ============================================================================
// PARTICLES
// ============================================================================

/**
 * Spawn particles in a radial burst pattern.
 * Respects MAX_PARTICLES.
 */
export function spawnParticles(
  particles: Particle[],
  x: number,
  y: number,
  count: number,
  color: string,
  chars: readonly string[] = PARTICLE_CHARS.burst,
  random: RandomSource = Math.random,
): void {
  const actualCount = Math.min(count, MAX_PARTICLES - particles.length);
  for (let i = 0; i < actualCount; i++) {
    const angle = (Math.PI * 2 * i) / count + random() * 0.5;
    const speed = 0.2 + random() * 0.3;
    particles.push({
      x,
      y,
      char: pick(chars, random) ?? '*',
      color,
      vx: Math.cos(angle) * speed,
      vy: Math.sin(angle) * speed * 0.5,
      life: 10 + Math.floor(random() * 8),
    });
  }
}

/**
 * Firework explosion: a central burst in mixed colors plus a sparkle ring.
 */
export function spawnFirework(
  particles: Particle[],
  x: number,
  y: number,
  colors: readonly string[],
  random: RandomSource = Math.random,
): void {
  const burst = Math.min(12, MAX_PARTICLES - particles.length);
  for (let i = 0; i < burst; i++) {
    const angle = (Math.PI * 2 * i) / 12;
    const speed = 0.4 + random() * 0.4;
    particles.push({
      x,
      y,
      char: pick(PARTICLE_CHARS.firework, random) ?? '*',
      color: pick(colors, random) ?? '\x1b[1;97m',
      vx: Math.cos(angle) * speed,
      vy: Math.sin(angle) * speed * 0.5 - 0.2,
      life: 20 + Math.floor(random() * 15),
    });
  }

  const ring = Math.min(8, MAX_PARTICLES - particles.length);
  for (let i = 0; i < ring; i++) {
    const angle = (Math.PI * 2 * i) / 8 + random() * 0.3;
    const dist = 1.5 + random();
    particles.push({
      x: x + Math.cos(angle) * dist,
      y: y + Math.sin(angle) * dist * 0.5,
      char: '✧',
      color: '\x1b[1;97m',
      vx: Math.cos(angle) * 0.15,
      vy: Math.sin(angle) * 0.1 - 0.1,
      life: 15 + Math.floor(random() * 10),
    });
  }
}

/**
 * A few sparkles drifting up from one point.
 */
export function spawnSparkleTrail(
  particles: Particle[],
  x: number,
  y: number,
  count: number,
  color: string,
  random: RandomSource = Math.random,
): void {
  const actualCount = Math.min(count, MAX_PARTICLES - particles.length);
  for (let i = 0; i < actualCount; i++) {
    particles.push({
      x: x + (random() - 0.5) * 2,
      y,
      char: pick(PARTICLE_CHARS.sparkle, random) ?? '*',
      color,
      vx: (random() - 0.5) * 0.2,
      vy: -0.2 - random() * 0.2,
      life: 8 + Math.floor(random() * 6),
    });
  }
}

/**
 * Update all particles: apply velocity, gravity, and remove dead ones.
 */
export function updateParticles(particles: Particle[], gravityMult: number = 1): void {
  for (let i = particles.length - 1; i >= 0; i--) {
    const p = particles[i];
    p.x += p.vx;
    p.y += p.vy;
    p.vy += 0.02 * gravityMult;
    p.life--;
    if (p.life <= 0) particles.splice(i, 1);
  }
}

/**
 * Draw the particles that fall inside a cols x rows screen.
 */
export function renderParticles(particles: readonly Particle[], cols: number, rows: number): string {
  let out = '';
  for (const p of particles) {
    const col = Math.round(p.x);
    const row = Math.round(p.y);
    if (col < 1 || col > cols || row < 1 || row > rows) continue;
    out += `${moveTo(row, col)}${p.color}${p.char}\x1b[0m`;
  }
  return out;
}
