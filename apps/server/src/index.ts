import { createApp } from './app';
import { config } from './config';

const app = createApp(config);

app.listen(config.port, () => {
  console.log(`Pixel topology server running on port ${config.port}`);
  console.log(`Health check: http://localhost:${config.port}/api/health`);
});

export default app;
