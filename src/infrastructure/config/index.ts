export { BreakerStorageKind, Environment, EnvironmentVariables, parseDependencyUrls, validate } from './env.validation';
export { setupSwagger } from './swagger.config';
