import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createServices } from './services.js';

const config = loadConfig();
const content = createServices(config);
const app = createApp(content, { corsOrigins: config.corsOrigins });

// Start
app.listen(config.port, () => {
  console.log(`[server] Content API running on http://localhost:${config.port}`);
  console.log(`[server] Generated images: ${config.image.outputDir}`);
});
