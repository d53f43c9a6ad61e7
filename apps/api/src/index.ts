import { createApp } from './app';
import { hasGenerativeBackend, loadConfig, loadEnvFiles } from './config';

loadEnvFiles();

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.log(`Pipeline Advisor API running on ${config.port}`);
  if (!hasGenerativeBackend(config)) {
    console.log('[API] No generative backend configured; recommendations are rule-based');
  }
});
