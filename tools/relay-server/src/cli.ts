import { DEFAULT_RELAY_PORT } from './index.js';
import { createRelayServer } from './server.js';

const PORT = Number(process.env.PORT) || DEFAULT_RELAY_PORT;
const server = createRelayServer(PORT);

server.listening
  .then((port) => {
    console.log(`roundgrid relay running on ws://localhost:${port}`);
  })
  .catch((err: unknown) => {
    console.error('Failed to start relay server:', err);
    process.exit(1);
  });

process.on('SIGINT', () => {
  server.close().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error('Failed to stop relay server:', err);
      process.exit(1);
    },
  );
});
