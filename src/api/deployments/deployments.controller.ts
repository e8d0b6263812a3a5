import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiBody, ApiHeader, ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { Caller, CallerIdentity } from '../../common/caller.decorator';
import { ZodValidationPipe } from '../../common/zod-validation.pipe';
import {
  ListDeploymentsQuery,
  listDeploymentsQuerySchema,
} from '../../dto/list-deployments.dto';
import {
  TriggerDeploymentDto,
  TriggerDeploymentInput,
  triggerDeploymentSchema,
} from '../../dto/trigger-deployment.dto';
import { DeploymentsService } from './deployments.service';

@ApiTags('deployments')
@ApiHeader({ name: 'X-User-Id', required: true })
@Controller('deployments')
export class DeploymentsController {
  constructor(private readonly deploymentsService: DeploymentsService) {}

  @Post('trigger')
  @ApiOperation({ summary: 'Deploy a commit now (manual trigger)' })
  @ApiBody({ type: TriggerDeploymentDto })
  async trigger(
    @Caller() caller: CallerIdentity,
    @Body(new ZodValidationPipe(triggerDeploymentSchema)) body: TriggerDeploymentInput,
  ) {
    return this.deploymentsService.trigger(caller, body);
  }

  @Get()
  @ApiOperation({ summary: "List the caller's deployments, newest first" })
  @ApiQuery({ name: 'repo_full_name', required: false })
  @ApiQuery({ name: 'limit', required: false, example: 10 })
  @ApiQuery({ name: 'offset', required: false, example: 0 })
  async findAll(
    @Caller() caller: CallerIdentity,
    @Query(new ZodValidationPipe(listDeploymentsQuerySchema)) query: ListDeploymentsQuery,
  ) {
    return this.deploymentsService.list(caller.id, query);
  }

  // Sub-resources (before :id)
  @Get(':id/logs')
  @ApiOperation({ summary: 'Get the log lines of a deployment' })
  async getLogs(@Caller() caller: CallerIdentity, @Param('id', ParseUUIDPipe) id: string) {
    return this.deploymentsService.logsOf(id, caller.id);
  }

  @Get(':id/status')
  @ApiOperation({ summary: 'Get the in-memory status of a recent deployment' })
  async getStatus(@Caller() caller: CallerIdentity, @Param('id', ParseUUIDPipe) id: string) {
    return this.deploymentsService.statusOf(id, caller.id);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel a pending or running deployment' })
  async cancel(@Caller() caller: CallerIdentity, @Param('id', ParseUUIDPipe) id: string) {
    return this.deploymentsService.cancel(id, caller.id);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one deployment' })
  async findOne(@Caller() caller: CallerIdentity, @Param('id', ParseUUIDPipe) id: string) {
    return this.deploymentsService.findOwned(id, caller.id);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a deployment record and its logs' })
  async remove(@Caller() caller: CallerIdentity, @Param('id', ParseUUIDPipe) id: string) {
    await this.deploymentsService.remove(id, caller.id);
  }
}
