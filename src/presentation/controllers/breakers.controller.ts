import { Controller, Get, HttpCode, HttpStatus, NotFoundException, Param, Post } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { BreakerStatusDto } from '@/application/dtos';
import { BreakerRegistry } from '@/application/services/breaker-registry.service';
import type { CircuitBreaker } from '@/infrastructure/resilience';

@Controller('breakers')
@ApiTags('breakers')
export class BreakersController {
  constructor(private readonly registry: BreakerRegistry) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Lists every breaker created so far' })
  @ApiResponse({ status: HttpStatus.OK, description: 'Breaker snapshots', type: [BreakerStatusDto] })
  async list(): Promise<BreakerStatusDto[]> {
    return this.registry.list();
  }

  @Get(':name')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Returns the state of one breaker' })
  @ApiParam({ name: 'name', description: 'Dependency name', example: 'billing' })
  @ApiResponse({ status: HttpStatus.OK, description: 'Breaker snapshot', type: BreakerStatusDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Unknown dependency' })
  async findOne(@Param('name') name: string): Promise<BreakerStatusDto> {
    this.assertKnown(name);
    return this.registry.snapshot(name);
  }

  @Post(':name/open')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Opens the breaker; calls fail fast until the reset timeout elapses' })
  @ApiResponse({ status: HttpStatus.OK, type: BreakerStatusDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Unknown dependency' })
  async open(@Param('name') name: string): Promise<BreakerStatusDto> {
    return this.apply(name, (breaker) => breaker.open());
  }

  @Post(':name/close')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Closes the breaker and resets its failure counter' })
  @ApiResponse({ status: HttpStatus.OK, type: BreakerStatusDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Unknown dependency' })
  async close(@Param('name') name: string): Promise<BreakerStatusDto> {
    return this.apply(name, (breaker) => breaker.close());
  }

  @Post(':name/half-open')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Lets the next call through as a trial' })
  @ApiResponse({ status: HttpStatus.OK, type: BreakerStatusDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Unknown dependency' })
  async halfOpen(@Param('name') name: string): Promise<BreakerStatusDto> {
    return this.apply(name, (breaker) => breaker.halfOpen());
  }

  private async apply(name: string, action: (breaker: CircuitBreaker) => Promise<void>): Promise<BreakerStatusDto> {
    this.assertKnown(name);
    await action(await this.registry.get(name));
    return this.registry.snapshot(name);
  }

  private assertKnown(name: string): void {
    if (!this.registry.knownDependencies().includes(name)) {
      throw new NotFoundException(`No breaker for dependency "${name}"`);
    }
  }
}
