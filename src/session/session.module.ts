import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { RevokedToken } from './revoked-token.entity';
import { SESSION_OPTIONS, sessionOptionsFactory } from './session.options';
import { SessionService } from './session.service';

@Module({
  imports: [TypeOrmModule.forFeature([RevokedToken])],
  providers: [
    {
      provide: SESSION_OPTIONS,
      inject: [ConfigService],
      useFactory: sessionOptionsFactory,
    },
    SessionService,
  ],
  exports: [SessionService],
})
export class SessionModule { }
