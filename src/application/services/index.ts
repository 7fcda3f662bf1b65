export { BreakerRegistry } from './breaker-registry.service';
export type { RegistryBreakerOptions } from './breaker-registry.service';
export { HealthService } from './health.service';
export { CLIENT_ERROR_RESPONSES, ServiceClient } from './service-client.service';
export type { ServiceRequestOptions } from './service-client.service';
