import { Controller, Param, ParseUUIDPipe, Sse } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Observable, map } from 'rxjs';
import { DeploymentStreamEvent, DeploymentStreamService } from './deployment-stream.service';

@Controller('stream')
@ApiTags('stream')
export class SSEController {
  constructor(private readonly stream: DeploymentStreamService) {}

  /**
   * GET /stream/deployments/:id - existing log lines, then new ones as they are appended.
   * The event stream ends when the deployment does.
   */
  @Sse('deployments/:id')
  @ApiOperation({ summary: 'SSE: live logs and status of a deployment' })
  streamDeployment(
    @Param('id', ParseUUIDPipe) id: string,
  ): Observable<{ type: string; data: string }> {
    return this.stream
      .watch(id)
      .pipe(map((event: DeploymentStreamEvent) => ({ type: event.type, data: event.data })));
  }
}
