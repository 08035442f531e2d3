import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { CliModule } from './cli/cli.module';
import configuration from './config/configuration';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, load: [configuration] }), CliModule],
})
export class AppModule {}
