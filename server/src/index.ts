import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { createApp } from './app';
import { loadConfig } from './config/app.config';

const config = loadConfig();
const app = createApp(config);
const httpServer = createServer(app);

// Initialize Socket.IO
const io = new SocketIOServer(httpServer, {
  cors: {
    origin: config.corsOrigins,
    methods: ['GET', 'POST']
  },
  pingTimeout: 60000,
  pingInterval: 25000
});

// Routes look the server up here to push conversion events
app.locals.io = io;

io.on('connection', (socket) => {
  console.log(`🔌 Client connected: ${socket.id}`);

  socket.on('disconnect', (reason) => {
    console.log(`❌ Client disconnected: ${socket.id} (${reason})`);
  });

  socket.on('error', (error) => {
    console.error(`⚠️  Socket error for ${socket.id}:`, error);
  });
});

function shutdown(signal: string) {
  console.log(`${signal} received, closing server...`);
  io.close();
  httpServer.close(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

httpServer.listen(config.port, () => {
  console.log(`⚡️ Server is running on port ${config.port}`);
  console.log(`🎨 Emote API ready at http://localhost:${config.port}/api`);
  console.log(`🧵 Converting up to ${config.concurrency} sizes at once`);
});

export default app;
