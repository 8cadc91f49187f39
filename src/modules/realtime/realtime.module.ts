import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { FanoutModule } from './fanout.module';
import { NotificationModule } from '../notification/notification.module';
import { ConnectionRegistry } from './application/connection-registry';
import { LiveConnectionAuthenticator } from './application/live-connection.authenticator';
import { NotificationGateway } from './notification.gateway';
import { jwtModuleOptions } from '../../shared/infrastructure/auth/jwt-module.options';

@Module({
  imports: [
    JwtModule.registerAsync(jwtModuleOptions),
    FanoutModule,
    NotificationModule,
  ],
  providers: [ConnectionRegistry, LiveConnectionAuthenticator, NotificationGateway],
})
export class RealtimeModule {}
