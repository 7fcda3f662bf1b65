import { ApiProperty } from '@nestjs/swagger';
import type { CircuitStateName } from '@/domain/breaker';
import { CIRCUIT_STATES } from '@/domain/breaker';

export class BreakerStatusDto {
  @ApiProperty({ description: 'Dependency guarded by the breaker', example: 'billing' })
  name!: string;

  @ApiProperty({ description: 'Storage namespace of the breaker', example: 'production:billing' })
  namespace!: string;

  @ApiProperty({ description: 'Canonical breaker state', enum: [...CIRCUIT_STATES], example: 'closed' })
  state!: CircuitStateName;

  @ApiProperty({ description: 'Consecutive qualifying failures', example: 0 })
  failCounter!: number;

  @ApiProperty({ description: 'Failures tolerated before opening', example: 5 })
  failMax!: number;

  @ApiProperty({ description: 'Open duration before a trial call, in milliseconds', example: 15000 })
  resetTimeoutMs!: number;
}
