export { BreakerStatusDto } from './breaker-status.dto';
export { ComponentHealthDto, HealthResponseDto } from './health-response.dto';
export type { HealthStatus } from './health-response.dto';
