import { Room } from '@colyseus/core';
import type { ArraySchema } from '@colyseus/schema';
import type { Client } from 'colyseus';
import {
  GameState,
  simplifyPolygon,
  type GameEvent,
  type Point,
} from '@qix/common';
import { EnemyState, FilledAreaState, GameRoomState, PlayerState } from '../schema/GameSchema.js';
import { config } from '../config.js';
import { parseInputMessage } from './messages.js';

export interface GameRoomOptions {
  seed?: number;
}

/**
 * One single-player game per room, simulated on the server
 */
export class GameRoom extends Room<GameRoomState> {
  private game: GameState = new GameState();

  onCreate(options: GameRoomOptions = {}) {
    const seed = typeof options.seed === 'number' ? options.seed : Math.floor(Math.random() * 0xffffffff);
    this.game = new GameState({ seed, targetFillPercentage: config.targetFillPercentage });

    const state = new GameRoomState();
    state.width = this.game.config.width;
    state.height = this.game.config.height;
    state.targetFillPercentage = this.game.config.targetFillPercentage;
    this.setState(state);

    // The game is single-player
    this.maxClients = 1;

    // Set up message handlers
    this.onMessage('input', (client: Client, message: unknown) => {
      const input = parseInputMessage(message);
      if (!input) {
        console.warn(`⚠️ Ignoring malformed input from ${client.sessionId}:`, message);
        return;
      }
      this.game.setInput(input.direction);
    });

    this.onMessage('draw', () => {
      if (this.game.startDrawing()) {
        console.log(`✏️ Drawing started at (${this.game.player.x}, ${this.game.player.y})`);
      }
    });

    this.onMessage('restart', () => {
      if (this.game.status === 'playing') return;
      this.game.restart();
      console.log(`🔁 Restarted at level ${this.game.level}`);
      this.syncState();
    });

    // Set up fixed-timestep simulation
    this.setSimulationInterval(() => this.update(), 1000 / config.tickRate);

    this.syncState();
    console.log(`GameRoom created (seed ${seed}, ${this.game.enemies.length} qix)`);
  }

  onJoin(client: Client) {
    console.log(`🎮 Player ${client.sessionId} joined`);
  }

  onLeave(client: Client) {
    console.log(`Player ${client.sessionId} left`);
  }

  /**
   * Main game loop
   */
  private update(): void {
    try {
      const events = this.game.update();
      events.forEach((event) => this.logEvent(event));
      this.syncState();
    } catch (e) {
      console.error('❌ Simulation step failed:', e);
      // Don't crash the room, just skip this tick
    }
  }

  private logEvent(event: GameEvent): void {
    switch (event.type) {
      case 'captured':
        console.log(
          `✅ Captured ${event.area.toFixed(0)} (${event.resolution}), fill ${event.fillPercentage.toFixed(1)}%`
        );
        break;
      case 'collision':
        console.log(`💀 Qix hit the player at level ${this.game.level}`);
        break;
      case 'won':
        console.log(`🏆 Level ${this.game.level} won with ${event.fillPercentage.toFixed(1)}%`);
        break;
    }
  }

  /**
   * Sync game state to Colyseus state
   */
  private syncState(): void {
    const { state, game } = this;

    state.level = game.level;
    state.status = game.status;
    state.fillPercentage = game.fillPercentage;

    this.syncPlayer(state.player);
    this.syncEnemies();
    this.syncFilledAreas();
  }

  private syncPlayer(playerState: PlayerState): void {
    const { player } = this.game;
    playerState.x = player.x;
    playerState.y = player.y;
    playerState.drawing = player.drawing;
    playerState.direction = player.direction;

    // Only resync the trace when its length changed
    if (playerState.trace.length !== player.trace.length * 2) {
      this.fillFlat(playerState.trace, player.trace);
    }
  }

  private syncEnemies(): void {
    const { enemies } = this.state;
    const qixes = this.game.enemies;

    if (enemies.length !== qixes.length) {
      enemies.clear();
      for (let i = 0; i < qixes.length; i++) {
        enemies.push(new EnemyState());
      }
    }

    qixes.forEach((qix, i) => {
      const enemyState = enemies.at(i);
      if (!enemyState) return;
      enemyState.x = qix.x;
      enemyState.y = qix.y;
      enemyState.size = qix.size;
    });
  }

  /**
   * Territory only grows within a round, so only new polygons are sent
   */
  private syncFilledAreas(): void {
    const { filledAreas } = this.state;
    const polygons = this.game.player.territory.polygons;

    if (filledAreas.length > polygons.length) {
      filledAreas.clear();
    }

    for (let i = filledAreas.length; i < polygons.length; i++) {
      const area = new FilledAreaState();
      this.fillFlat(area.points, simplifyPolygon(polygons[i]));
      filledAreas.push(area);
    }
  }

  /**
   * Convert points to a flat array: [x1, y1, x2, y2, ...]
   */
  private fillFlat(target: ArraySchema<number>, points: readonly Point[]): void {
    target.clear();
    for (const point of points) {
      target.push(point.x, point.y);
    }
  }

  /**
   * Clean up when room is disposed
   */
  onDispose(): void {
    console.log('GameRoom disposed');
  }
}
