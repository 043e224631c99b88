import 'dotenv/config';
import { createApp } from './app.js';
import { loadServiceSettings } from './config.js';

const { port } = loadServiceSettings();
const app = createApp();

app.listen(port, () => {
  console.log(`[api] up on :${port}`);
});
