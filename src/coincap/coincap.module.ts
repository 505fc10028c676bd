import { Module } from '@nestjs/common';
import { CoinCapService } from './coincap.service';

@Module({
  providers: [CoinCapService],
  exports: [CoinCapService],
})
export class CoinCapModule {}
