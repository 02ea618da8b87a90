import { closeDb } from '@fxconvert/db';
import { runServiceAndExit } from '@fxconvert/http';
import { buildConverterApiApp } from './app.js';

runServiceAndExit({
  serviceName: 'converter-api',
  buildApp: buildConverterApiApp,
  defaultPort: 3020,
  portEnv: 'CONVERTER_API_PORT',
  hostEnv: 'CONVERTER_API_HOST',
  onShutdown: closeDb
});
