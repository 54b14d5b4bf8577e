import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { S3Client } from '@aws-sdk/client-s3';
import { FilesService } from './files.service';
import { S3_CLIENT } from './tokens';

@Module({
    imports: [ConfigModule],
    providers: [
        {
            provide: S3_CLIENT,
            inject: [ConfigService],
            useFactory: (config: ConfigService) => {
                const endpoint = config.get<string>('S3_ENDPOINT', 'http://localhost:9000');
                const accessKeyId = config.get<string>('S3_ACCESS_KEY', 'minioadmin');
                const secretAccessKey = config.get<string>('S3_SECRET_KEY', 'minioadmin');
                const forcePathStyle = config.get<string>('S3_FORCE_PATH_STYLE', 'true') !== 'false';
                const region = config.get<string>('S3_REGION', 'us-east-1');
                return new S3Client({
                    region,
                    endpoint,
                    credentials: { accessKeyId, secretAccessKey },
                    forcePathStyle,
                    requestHandler: {
                        requestTimeout: 15_000,
                        connectionTimeout: 5_000,
                    },
                });
            },
        },
        FilesService,
    ],
    exports: [FilesService],
})
export class FilesModule { }
