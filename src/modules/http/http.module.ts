import { Global, Module } from '@nestjs/common';
import axios from 'axios';
import { HTTP_CLIENT } from './tokens';

@Global()
@Module({
  providers: [
    {
      provide: HTTP_CLIENT,
      useFactory: () =>
        axios.create({
          timeout: 10_000,
          headers: { 'User-Agent': 'inkwell-api' },
        }),
    },
  ],
  exports: [HTTP_CLIENT],
})
export class HttpModule {}
