import { DynamicModule, Module } from '@nestjs/common';
import { COINMARKETCAP_OPTIONS, CoinMarketCapOptions } from './coinmarketcap.constants';
import { CoinMarketCapService } from './coinmarketcap.service';

/**
 * CoinMarketCapModule - registers a single CoinMarketCapService for the app.
 * Options passed here take precedence over COINMARKETCAP_* environment values;
 * the API key must come from one of the two or the service refuses to start.
 */
@Module({})
export class CoinMarketCapModule {
  static forRoot(options: CoinMarketCapOptions = {}): DynamicModule {
    return {
      module: CoinMarketCapModule,
      global: true,
      providers: [
        { provide: COINMARKETCAP_OPTIONS, useValue: options },
        CoinMarketCapService,
      ],
      exports: [CoinMarketCapService],
    };
  }
}
