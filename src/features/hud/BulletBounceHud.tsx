import React from 'react';
import clsx from 'clsx';
import type { BulletBounceSnapshot, PlayerSnapshot } from '../../game/bullet_bounce/BulletBounceGame';
import { POWER_UP_LABELS } from '../../game/bullet_bounce/PowerUp';

/** Whole seconds rounded up, as `M:SS`. */
export function formatClock(ms: number): string {
  const total = Math.max(0, Math.ceil(ms / 1000));
  const minutes = Math.floor(total / 60);
  const seconds = total % 60;
  return `${minutes}:${String(seconds).padStart(2, '0')}`;
}

function PlayerPanel({ player }: { player: PlayerSnapshot }){
  return (
    <section
      className={clsx('hud-player', `hud-player--p${player.id}`, player.eliminated && 'hud-player--out')}
      aria-label={`Player ${player.id}`}
    >
      <span className="hud-score">{`P${player.id}: ${player.score}`}</span>
      <span className="hud-health">{`HP ${player.health}/${player.maxHealth}`}</span>
      {player.powerUps.length > 0 && (
        <ul className="hud-powerups">
          {player.powerUps.map(pu => (
            <li key={pu.kind} className={clsx('hud-powerup', pu.kind === 'shield' && player.shielded && 'hud-powerup--armed')}>
              {`${POWER_UP_LABELS[pu.kind]} ${Math.ceil(pu.remainingMs / 1000)}s`}
            </li>
          ))}
        </ul>
      )}
    </section>
  );
}

function Banner({ snapshot }: { snapshot: BulletBounceSnapshot }): React.ReactElement | null {
  switch (snapshot.state) {
    case 'countdown':
      return <h2 className="hud-banner hud-banner--countdown">{String(Math.max(1, Math.ceil(snapshot.countdownRemainingMs / 1000)))}</h2>;
    case 'paused':
      return <h2 className="hud-banner">Paused - press P to resume</h2>;
    case 'roundOver': {
      const winner = snapshot.lastRound?.winner ?? null;
      return <h2 className="hud-banner">{winner === null ? 'Round drawn' : `Player ${winner} wins the round!`}</h2>;
    }
    case 'matchOver': {
      const match = snapshot.match;
      if (!match || match.abandoned) return <h2 className="hud-banner">Match abandoned</h2>;
      return <h2 className="hud-banner">{match.winner === null ? 'Match drawn' : `Player ${match.winner} wins the match!`}</h2>;
    }
    case 'playing':
      return null;
  }
}

/**
 * Heads-up display for a running duel. Reads the snapshot only.
 */
export function BulletBounceHud({ snapshot }: { snapshot: BulletBounceSnapshot }){
  return (
    <div className={clsx('hud', snapshot.state === 'paused' && 'hud--paused')} data-state={snapshot.state}>
      <header className="hud-bar">
        {snapshot.players.map(p => <PlayerPanel key={p.id} player={p} />)}
        <span className="hud-round">{`Round ${snapshot.round} / ${snapshot.maxRounds}`}</span>
        <span className="hud-wins">{`Wins ${snapshot.roundWins[1]} - ${snapshot.roundWins[2]}`}</span>
        <span className="hud-clock">{formatClock(snapshot.roundRemainingMs)}</span>
      </header>
      <Banner snapshot={snapshot} />
    </div>
  );
}

export default BulletBounceHud;
