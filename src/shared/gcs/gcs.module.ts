import { Module } from '@nestjs/common';
import { LoggingModule } from '../logging/logging.module';
import { ConfigModule } from '../../config/config.module';
import { GcsService } from './gcs.service';

@Module({
  imports: [ConfigModule, LoggingModule],
  providers: [GcsService],
  exports: [GcsService],
})
export class GcsModule {}
