import { Module } from '@nestjs/common';
import { UsersModule } from '../users/users.module';
import { TokensModule } from '../tokens';
import { UserLookupController } from './user-lookup.controller';
import { UserLookupService } from './user-lookup.service';

/** LookupModule — the read-only gRPC surface (user.UserService) */
@Module({
  imports: [UsersModule, TokensModule],
  controllers: [UserLookupController],
  providers: [UserLookupService],
})
export class LookupModule {}
