import { Server } from '@colyseus/core';
import { WebSocketTransport } from '@colyseus/ws-transport';
import express from 'express';
import cors from 'cors';
import { createServer } from 'http';
import { GameRoom } from './rooms/GameRoom.js';
import { config } from './config.js';

const app = express();
app.use(cors());
app.use(express.json());

const httpServer = createServer(app);

const gameServer = new Server({
  transport: new WebSocketTransport({
    server: httpServer,
  }),
});

// Single-player Qix room; each client gets its own game
gameServer.define('qix', GameRoom);

// Health check endpoint
app.get('/health', (req, res) => {
  res.json({ status: 'ok' });
});

httpServer.listen(config.port, () => {
  console.log(`🎮 Qix server listening on port ${config.port} (${config.nodeEnv})`);
});

// Graceful shutdown
process.on('SIGTERM', () => {
  console.log('SIGTERM received, shutting down gracefully');
  gameServer.gracefullyShutdown(true).catch((err: unknown) => {
    console.error('❌ Shutdown failed:', err);
  });
});
