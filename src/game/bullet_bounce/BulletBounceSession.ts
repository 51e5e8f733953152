import { GameLoop, type GameLoopOptions } from '../../core/GameLoop';
import { Logger } from '../../core/Logger';
import { KeyboardTracker, type KeyboardSource } from '../keyState';
import { BulletBounceGame, type BulletBounceOptions, type BulletBounceSnapshot } from './BulletBounceGame';
import { DEFAULT_KEY_BINDINGS, readFrameInput, type KeyBindings } from './input';

export interface BulletBounceSessionOptions extends BulletBounceOptions {
  bindings?: KeyBindings;
  loop?: GameLoopOptions;
  /** Called once per frame after the logic ticks, with the interpolation alpha. */
  onRender?: (snapshot: BulletBounceSnapshot, alpha: number) => void;
  /** Called once when the player quits back to the launcher. */
  onExit?: (snapshot: BulletBounceSnapshot) => void;
}

/**
 * One running duel on screen: owns the game, the keyboard tracker and the fixed-step loop.
 * Each logic tick reads the held keys plus the presses since the previous tick.
 */
export class BulletBounceSession {
  readonly game: BulletBounceGame;
  readonly keyboard = new KeyboardTracker();
  readonly loop: GameLoop;
  private readonly bindings: KeyBindings;
  private readonly onExit?: (snapshot: BulletBounceSnapshot) => void;

  constructor(private readonly source: KeyboardSource, options: BulletBounceSessionOptions = {}) {
    this.game = new BulletBounceGame({ config: options.config, random: options.random });
    this.bindings = options.bindings ?? DEFAULT_KEY_BINDINGS;
    this.onExit = options.onExit;
    const onRender = options.onRender;
    this.loop = new GameLoop(
      dtMs => this.step(dtMs),
      alpha => onRender?.(this.game.snapshot(), alpha),
      options.loop,
    );
  }

  start(): void {
    if (this.loop.isRunning()) return;
    this.keyboard.attach(this.source);
    this.loop.resetTiming();
    this.loop.start();
    Logger.info('[BulletBounceSession] started');
  }

  stop(): void {
    this.loop.stop();
    this.keyboard.detach();
    this.keyboard.reset();
  }

  isRunning(): boolean {
    return this.loop.isRunning();
  }

  private step(dtMs: number): void {
    if (this.game.exitRequested()) return;
    const input = readFrameInput(this.keyboard.held, this.keyboard.drainPressed(), this.bindings);
    this.game.update(dtMs, input);
    if (this.game.exitRequested()) {
      this.stop();
      Logger.info('[BulletBounceSession] exit requested; session stopped');
      this.onExit?.(this.game.snapshot());
    }
  }
}
