import {
  Injectable,
  CanActivate,
  ExecutionContext,
  UnauthorizedException,
  Logger,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { timingSafeEqual } from 'crypto';
import { FastifyRequest } from 'fastify';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';
import { ErrorCode } from '../interfaces/response.interface';

export const INTERNAL_API_KEY_HEADER = 'x-internal-api-key';

/**
 * 内部 API 守卫
 * 积分接口只给内部服务调用，Webhook 路由用 @Public() 跳过
 */
@Injectable()
export class InternalApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(InternalApiKeyGuard.name);
  private readonly apiKey: string;

  constructor(
    private reflector: Reflector,
    private configService: ConfigService,
  ) {
    this.apiKey = this.configService.get<string>('internalApi.key') || '';
    if (!this.apiKey) {
      this.logger.warn('INTERNAL_API_KEY not configured, internal routes will reject all requests');
    }
  }

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<FastifyRequest>();
    const provided = request.headers[INTERNAL_API_KEY_HEADER];

    if (typeof provided !== 'string' || !this.apiKey || !this.matches(provided)) {
      throw new UnauthorizedException({
        code: ErrorCode.UNAUTHORIZED,
        message: 'Valid internal API key required',
      });
    }

    return true;
  }

  private matches(provided: string): boolean {
    const expected = Buffer.from(this.apiKey);
    const actual = Buffer.from(provided);
    return expected.length === actual.length && timingSafeEqual(expected, actual);
  }
}
