import { createApp } from './app';
import { DEFAULT_DT, DEFAULT_STEPS, MAX_STEPS, PORT } from './config/simulation';
import { logInfo } from './observability/logger';

const app = createApp();

app.listen(PORT, () => {
  logInfo('api_server_started', {
    port: PORT,
    defaultSteps: DEFAULT_STEPS,
    defaultDt: DEFAULT_DT,
    maxSteps: MAX_STEPS
  });
});
