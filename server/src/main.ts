// server/src/main.ts

import http from 'node:http';
import { CONFIG } from './config.js';
import { createApp } from './http.js';
import { attachWs } from './ws.js';

const app = createApp();
const server = http.createServer(app);
attachWs(server);

server.listen(CONFIG.port, () => {
  console.log(`server listening on http://localhost:${CONFIG.port}`);
  console.log(`ws on ws://localhost:${CONFIG.port}${CONFIG.wsPath}`);
});
