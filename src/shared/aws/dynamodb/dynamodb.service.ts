import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, PutCommand } from '@aws-sdk/lib-dynamodb';
import { AppConfig } from '../../../config/configuration';
import { PinoLoggerService } from '../../logging/pino-logger.service';

export interface PutItemOptions {
  /** e.g. `attribute_not_exists(id)` to refuse overwrites */
  conditionExpression?: string;
}

@Injectable()
export class DynamoDbService implements OnModuleDestroy {
  private readonly client: DynamoDBClient;
  private readonly docClient: DynamoDBDocumentClient;
  private readonly tableName: string;
  private readonly logger: PinoLoggerService;

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    logger: PinoLoggerService,
  ) {
    const awsConfig = this.configService.get('aws', { infer: true });
    const dynamoConfig = this.configService.get('dynamodb', { infer: true });

    this.client = new DynamoDBClient({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.docClient = DynamoDBDocumentClient.from(this.client, {
      marshallOptions: {
        removeUndefinedValues: true,
      },
    });

    this.tableName = dynamoConfig.tableName;
    this.logger = logger.forContext(DynamoDbService.name);
  }

  async putItem(item: Record<string, unknown>, options: PutItemOptions = {}): Promise<void> {
    await this.docClient.send(
      new PutCommand({
        TableName: this.tableName,
        Item: item,
        ...(options.conditionExpression && {
          ConditionExpression: options.conditionExpression,
        }),
      }),
    );

    this.logger.debug({ tableName: this.tableName }, 'Item written');
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
