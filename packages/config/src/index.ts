export { loadRuntimeConfig, type RuntimeConfig } from './env.js';
export {
  loadConverterCliEnv,
  loadConverterServiceEnv,
  type ConverterCliEnv,
  type ConverterServiceEnv
} from './service-env.js';
