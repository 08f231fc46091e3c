/**
 * Turns terminal tokens into InputEvents.
 *
 * Legacy terminals only report key presses, and only with the modifiers
 * folded into the key. For those, each modifier carried by a sequence is
 * reported as its own key-down first (so Ctrl+Alt+Right arrives as Alt,
 * Control, ArrowRight), and key-ups are synthesized a short time later.
 * Once the terminal confirms the kitty keyboard protocol, events pass
 * through with their real press/release.
 */

import { systemScheduler, type Scheduler, type TimerHandle } from '../core/scheduler';
import {
  buttonTransition,
  keyTransition,
  MODIFIER_KEYS,
  normalizeKeyName,
  pointerMotion,
  scrollTransition,
  type InputEvent,
  type KeyModifier,
  type MouseButton,
} from './inputEvents';
import type { PointerSurface } from './surface';
import type { KeyToken, MouseToken } from './terminalInput';

/** How long a legacy key counts as held (raw stdin has no key release). */
export const SYNTHETIC_RELEASE_MS = 80;

const LOW_BUTTONS: Array<MouseButton | null> = ['left', 'middle', 'right', null];

export interface InputTranslatorOptions {
  surface: PointerSurface;
  scheduler?: Scheduler;
  releaseDelayMs?: number;
}

export class InputTranslator {
  private enhanced = false;
  private lastButton: MouseButton = 'left';
  private readonly held = new Map<string, TimerHandle>();
  private readonly surface: PointerSurface;
  private readonly scheduler: Scheduler;
  private readonly releaseDelayMs: number;

  constructor(private readonly emit: (event: InputEvent) => void, options: InputTranslatorOptions) {
    this.surface = options.surface;
    this.scheduler = options.scheduler ?? systemScheduler;
    this.releaseDelayMs = options.releaseDelayMs ?? SYNTHETIC_RELEASE_MS;
  }

  get enhancedKeyboard(): boolean {
    return this.enhanced;
  }

  /** Called when the terminal answers the keyboard protocol query. */
  useEnhancedKeyboard(): void {
    this.enhanced = true;
    this.releaseAll();
  }

  key(token: KeyToken): void {
    const now = this.scheduler.now();

    if (this.enhanced) {
      this.emit(keyTransition(token.key, token.action !== 'release', now, token.modifiers));
      return;
    }

    if (token.action === 'release') return;

    const own = normalizeKeyName(token.key);
    for (const modifier of token.modifiers) {
      const modifierKey = MODIFIER_KEYS[modifier];
      if (modifierKey !== own) {
        this.press(modifierKey, [modifier], now);
      }
    }
    this.press(token.key, token.modifiers, now);
  }

  mouse(token: MouseToken): void {
    const now = this.scheduler.now();
    const { x, y } = this.surface.toPixel(token.col, token.row);
    const low = token.code & 3;

    if (token.code & 64) {
      if (token.release) return;
      const dx = low === 2 ? -1 : low === 3 ? 1 : 0;
      const dy = low === 0 ? -1 : low === 1 ? 1 : 0;
      this.emit(scrollTransition(dx, dy, now));
      return;
    }

    if (token.code & 32) {
      this.emit(pointerMotion(x, y, now));
      return;
    }

    let button: MouseButton;
    if (token.code & 128) {
      button = 'other';
    } else {
      // X10 reports every release as button 3; use the last press.
      button = LOW_BUTTONS[low] ?? this.lastButton;
    }
    if (!token.release) {
      this.lastButton = button;
    }
    this.emit(buttonTransition(button, x, y, !token.release, now));
  }

  dispose(): void {
    for (const handle of this.held.values()) {
      handle.cancel();
    }
    this.held.clear();
  }

  private press(key: string, modifiers: readonly KeyModifier[], now: number): void {
    const id = normalizeKeyName(key);
    this.held.get(id)?.cancel();
    this.emit(keyTransition(key, true, now, modifiers));
    this.held.set(id, this.scheduler.schedule(this.releaseDelayMs, () => {
      this.held.delete(id);
      this.emit(keyTransition(key, false, this.scheduler.now(), modifiers));
    }));
  }

  /** Flush pending synthetic releases immediately. */
  private releaseAll(): void {
    const now = this.scheduler.now();
    for (const [id, handle] of this.held) {
      handle.cancel();
      this.emit(keyTransition(id, false, now));
    }
    this.held.clear();
  }
}
