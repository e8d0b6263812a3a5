import {
  BadRequestException,
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Req,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiBody, ApiHeader, ApiOperation, ApiTags } from '@nestjs/swagger';
import { parsePushEvent } from './push-event';
import { PushTriggerService } from './push-trigger.service';
import { verifyGithubSignature } from './signature';

export type WebhookResponse =
  | { status: 'ignored'; reason: string }
  | { status: 'skipped'; reason: string }
  | { status: 'deployment_started'; deployment_id: string };

@Controller('webhooks')
@ApiTags('webhooks')
export class GithubWebhookController {
  private readonly logger = new Logger(GithubWebhookController.name);

  constructor(
    private readonly pushTrigger: PushTriggerService,
    private readonly config: ConfigService,
  ) {}

  /**
   * GitHub delivery endpoint. Anything but a branch push with a head commit is acknowledged
   * and ignored; a push starts at most one deployment.
   */
  @Post('github')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Receive a GitHub webhook delivery' })
  @ApiHeader({ name: 'X-GitHub-Event', required: true })
  @ApiHeader({ name: 'X-Hub-Signature-256', required: false })
  @ApiBody({
    description: 'GitHub event payload',
    schema: { type: 'object', additionalProperties: true },
  })
  async receive(
    @Headers('x-github-event') eventType: string | undefined,
    @Headers('x-hub-signature-256') signature: string | undefined,
    @Req() req: { rawBody?: Buffer },
    @Body() body: unknown,
  ): Promise<WebhookResponse> {
    if (!eventType) {
      throw new BadRequestException('X-GitHub-Event header missing');
    }

    const secret = this.config.get<string>('GITHUB_WEBHOOK_SECRET') ?? '';
    if (secret) {
      const payload = req.rawBody ?? JSON.stringify(body);
      if (!verifyGithubSignature(payload, signature, secret)) {
        throw new UnauthorizedException('Invalid webhook signature');
      }
    }

    const result = parsePushEvent(eventType, body);
    if (result.kind === 'invalid') {
      throw new BadRequestException(result.reason);
    }
    if (result.kind === 'ignored') {
      this.logger.debug(`Ignoring delivery: ${result.reason}`);
      return { status: 'ignored', reason: result.reason };
    }

    const deployment = await this.pushTrigger.handlePush(result.event);
    if (!deployment) {
      return { status: 'skipped', reason: 'No auto-deploy configuration for this branch' };
    }
    return { status: 'deployment_started', deployment_id: deployment.id };
  }
}
