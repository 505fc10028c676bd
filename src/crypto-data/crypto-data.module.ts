import { Module } from '@nestjs/common';
import { CryptoDataService } from './crypto-data.service';

// CoinMarketCapService comes from the global CoinMarketCapModule.forRoot()
@Module({
  providers: [CryptoDataService],
  exports: [CryptoDataService],
})
export class CryptoDataModule {}
