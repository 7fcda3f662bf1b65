export { BreakersController } from './breakers.controller';
export { HealthController } from './health.controller';
