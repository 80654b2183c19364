import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
} from '@nestjs/common';
import type { RequestUser } from '../interfaces';

/**
 * Admits staff users only. Must run after JwtAuthGuard:
 *
 * ```ts
 * @UseGuards(JwtAuthGuard, StaffGuard)
 * ```
 */
@Injectable()
export class StaffGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context
      .switchToHttp()
      .getRequest<{ user?: RequestUser }>();

    if (!request.user?.isStaff) {
      throw new ForbiddenException(
        'You do not have permission to perform this action.',
      );
    }

    return true;
  }
}
