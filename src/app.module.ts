import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { Env, validateEnv } from './core/env.validation';
import { ContactModule } from './contact/contact.module';
import { SessionModule } from './session/session.module';
import { UserModule } from './user/user.module';

function typeOrmOptionsFactory(configService: ConfigService<Env, true>): TypeOrmModuleOptions {
  const common = {
    autoLoadEntities: true,
    synchronize: configService.get('DB_SYNCHRONIZE', { infer: true }),
  };

  if (configService.get('DB_TYPE', { infer: true }) === 'postgres') {
    return {
      ...common,
      type: 'postgres',
      host: configService.get('DB_HOST', { infer: true }),
      port: configService.get('DB_PORT', { infer: true }),
      username: configService.get('DB_USER', { infer: true }),
      password: configService.get('DB_PASSWORD', { infer: true }),
      database: configService.get('DB_NAME', { infer: true }),
      ssl: configService.get('DB_SSL', { infer: true }) ? { rejectUnauthorized: false } : false,
    };
  }

  return {
    ...common,
    type: 'better-sqlite3',
    database: configService.get('SQLITE_PATH', { infer: true }),
  };
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: typeOrmOptionsFactory,
    }),
    SessionModule,
    UserModule,
    ContactModule,
  ],
})
export class AppModule { }
