export type KeyState = { [key: string]: boolean };

/** Minimal slice of `window` / `document` the keyboard tracker needs. */
export interface KeyboardSource {
  addEventListener(type: 'keydown' | 'keyup', listener: (e: { key: string; repeat?: boolean }) => void): void;
  removeEventListener(type: 'keydown' | 'keyup', listener: (e: { key: string; repeat?: boolean }) => void): void;
}

/**
 * Held keys plus the presses that happened since the last `drainPressed()`. One instance per
 * game screen; `detach()` on teardown.
 */
export class KeyboardTracker {
  readonly held: KeyState = {};
  private pressed = new Set<string>();
  private source: KeyboardSource | null = null;

  private readonly onDown = (e: { key: string; repeat?: boolean }) => {
    const key = e.key.toLowerCase();
    if (!this.held[key] && !e.repeat) this.pressed.add(key);
    this.held[key] = true;
  };

  private readonly onUp = (e: { key: string }) => {
    this.held[e.key.toLowerCase()] = false;
  };

  attach(source: KeyboardSource): void {
    if (this.source) this.detach();
    this.source = source;
    source.addEventListener('keydown', this.onDown);
    source.addEventListener('keyup', this.onUp);
  }

  detach(): void {
    if (!this.source) return;
    this.source.removeEventListener('keydown', this.onDown);
    this.source.removeEventListener('keyup', this.onUp);
    this.source = null;
  }

  /** Presses since the previous call; the internal buffer starts empty again. */
  drainPressed(): Set<string> {
    const out = this.pressed;
    this.pressed = new Set();
    return out;
  }

  reset(): void {
    for (const key of Object.keys(this.held)) this.held[key] = false;
    this.pressed.clear();
  }
}
