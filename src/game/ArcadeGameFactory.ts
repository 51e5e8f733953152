import type { BulletBounceConfigOverrides } from '../config/bulletBounce';
import { Logger } from '../core/Logger';
import type { RandomSource } from '../core/random';
import type { ArcadeGame, ArcadeGameId } from './ArcadeGame';
import { BulletBounceGame, type BulletBounceSnapshot } from './bullet_bounce/BulletBounceGame';
import type { FrameInput } from './bullet_bounce/input';
import type { GameState } from './bullet_bounce/stateMachine';

export interface CreateGameOptions {
  bulletBounce?: BulletBounceConfigOverrides;
  random?: RandomSource;
}

/** Every game this build can launch, seen through the launcher capability. */
export type LaunchableGame = ArcadeGame<FrameInput, BulletBounceSnapshot, GameState>;

/**
 * Factory the launcher uses to build the selected game.
 */
export class ArcadeGameFactory {
  static createGame(id: ArcadeGameId, options: CreateGameOptions = {}): LaunchableGame | null {
    switch (id) {
      case 'bullet_bounce':
        return new BulletBounceGame({ config: options.bulletBounce, random: options.random });

      // Stack Dash and Ghost Chase ship with the launcher package
      default:
        Logger.warn(`[ArcadeGameFactory] no simulation core for '${id}'`);
        return null;
    }
  }
}
