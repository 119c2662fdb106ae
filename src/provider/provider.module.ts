import { Module } from '@nestjs/common';
import axios from 'axios';
import { HTTP_CLIENT, YandexGptClient } from './yandex-gpt.client.js';

@Module({
  providers: [
    { provide: HTTP_CLIENT, useFactory: () => axios.create() },
    YandexGptClient,
  ],
  exports: [YandexGptClient],
})
export class ProviderModule {}
