import { createApp } from './app.js';
import { loadServerConfig } from './config.js';

const config = loadServerConfig();

createApp(config).listen(config.port, () => {
  console.log(`Server listening on http://localhost:${config.port}`);
});
