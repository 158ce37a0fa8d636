// Nest Modules
import { Controller, Get, Header } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiProduces, ApiTags } from '@nestjs/swagger';

@ApiTags('Health')
@Controller()
export class AppController {
  /**
   * GET /healthz
   */
  @Get('healthz')
  @Header('Content-Type', 'text/plain; charset=utf-8')
  @ApiProduces('text/plain')
  @ApiOperation({ summary: 'Liveness check' })
  @ApiOkResponse({ description: 'OK' })
  healthz(): string {
    return 'OK\n';
  }
}
