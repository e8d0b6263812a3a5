import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
} from '@nestjs/common';
import { ApiBody, ApiHeader, ApiOperation, ApiTags } from '@nestjs/swagger';
import { Caller, CallerIdentity } from '../../common/caller.decorator';
import { ZodValidationPipe } from '../../common/zod-validation.pipe';
import {
  CreateConfigDto,
  CreateConfigInput,
  createConfigSchema,
} from '../../dto/create-config.dto';
import {
  UpdateConfigDto,
  UpdateConfigInput,
  updateConfigSchema,
} from '../../dto/update-config.dto';
import { ConfigsService } from './configs.service';

@ApiTags('configs')
@ApiHeader({ name: 'X-User-Id', required: true })
@Controller('configs')
export class ConfigsController {
  constructor(private readonly configsService: ConfigsService) {}

  @Get()
  @ApiOperation({ summary: "List the caller's deployment configurations" })
  async findAll(@Caller() caller: CallerIdentity) {
    return this.configsService.findAll(caller.id);
  }

  @Get(':owner/:repo')
  @ApiOperation({ summary: 'Get the deployment configuration of one repository' })
  async findOne(
    @Caller() caller: CallerIdentity,
    @Param('owner') owner: string,
    @Param('repo') repo: string,
  ) {
    return this.configsService.findForRepository(caller.id, `${owner}/${repo}`);
  }

  @Post()
  @ApiOperation({ summary: 'Create a deployment configuration' })
  @ApiBody({ type: CreateConfigDto })
  async create(
    @Caller() caller: CallerIdentity,
    @Body(new ZodValidationPipe(createConfigSchema)) body: CreateConfigInput,
  ) {
    return this.configsService.create(caller.id, body);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a deployment configuration' })
  @ApiBody({ type: UpdateConfigDto })
  async update(
    @Caller() caller: CallerIdentity,
    @Param('id', ParseUUIDPipe) id: string,
    @Body(new ZodValidationPipe(updateConfigSchema)) body: UpdateConfigInput,
  ) {
    return this.configsService.update(id, caller.id, body);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a deployment configuration' })
  async remove(@Caller() caller: CallerIdentity, @Param('id', ParseUUIDPipe) id: string) {
    await this.configsService.remove(id, caller.id);
  }
}
