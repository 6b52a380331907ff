import { Module } from '@nestjs/common';
import { LoggingModule } from '../../logging/logging.module';
import { ConfigModule } from '../../../config/config.module';
import { DynamoDbService } from './dynamodb.service';

@Module({
  imports: [ConfigModule, LoggingModule],
  providers: [DynamoDbService],
  exports: [DynamoDbService],
})
export class DynamoDbModule {}
