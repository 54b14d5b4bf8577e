import { INestApplication } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import {
  PROFILE_ID_HEADER,
  SECRET_TOKEN_HEADER,
  SERVICE_TOKEN_HEADER,
} from '../types/request.interface';

export const swaggerInit = (app: INestApplication) => {
  const host = process.env.PUBLIC_HOST_IP;
  const port = process.env.PORT || '3000';

  const config = new DocumentBuilder()
    .setTitle('Inkwell API')
    .setDescription(
      [
        'Web novel reading platform API',
        '',
        '说明:',
        '- 匿名档案：创建时返回 secret_token，之后以 X-Profile-ID + X-Secret-Token 认证',
        '- 同步码：8 位，15 分钟有效，一次性使用',
        '- 评论需经 Telegram 审核后才公开',
        `- 携带 ${SERVICE_TOKEN_HEADER} 的内部调用不受 IP 限流`,
      ].join('\n'),
    )
    .setVersion('1.0.0')
    .addServer(host ? `http://${host}:${port}` : `http://localhost:${port}`)
    .addApiKey(
      { type: 'apiKey', name: PROFILE_ID_HEADER, in: 'header', description: 'Profile id (usr_...)' },
      'profile-id',
    )
    .addApiKey(
      { type: 'apiKey', name: SECRET_TOKEN_HEADER, in: 'header', description: 'Profile secret token' },
      'secret-token',
    )
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document, {
    customSiteTitle: 'Inkwell API Docs',
    swaggerOptions: {
      persistAuthorization: true,
      docExpansion: 'none',
      defaultModelsExpandDepth: 1,
    },
  });
};
