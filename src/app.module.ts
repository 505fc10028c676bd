import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';

import { CoinCapModule } from './coincap/coincap.module';
import { CoinMarketCapModule } from './coinmarketcap/coinmarketcap.module';
import { CryptoDataModule } from './crypto-data/crypto-data.module';

// Check if .env file is readable before trying to load it
const envFilePath = path.join(process.cwd(), '.env');
const canReadEnvFile = (() => {
  try {
    fs.accessSync(envFilePath, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
})();

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: canReadEnvFile ? '.env' : undefined,
      ignoreEnvFile: !canReadEnvFile,
      expandVariables: true,
    }),

    CoinCapModule,
    CoinMarketCapModule.forRoot(),
    CryptoDataModule,
  ],
})
export class AppModule {}
