import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { CryptoDataService } from './crypto-data/crypto-data.service';
import { daysBefore, formatCalendarDate } from './common/utils/date-range';

const DEFAULT_LOOKBACK_DAYS = 30;

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  logger.log('🚀 Starting crypto market data client...');

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'error', 'warn', 'debug'],
  });

  try {
    const config = app.get(ConfigService);
    const today = new Date();
    const ticker = config.get<string>('REPORT_TICKER', 'BTC');
    const start = config.get<string>(
      'REPORT_START',
      formatCalendarDate(daysBefore(today, DEFAULT_LOOKBACK_DAYS)),
    );
    const end = config.get<string>('REPORT_END', formatCalendarDate(today));

    const payload = await app.get(CryptoDataService).formatCryptoDataForAgents(ticker, start, end);
    process.stdout.write(`${JSON.stringify(payload, null, 2)}\n`);

    logger.log(`✅ ${payload.priceData.length} candles collected for ${payload.ticker}`);
  } finally {
    await app.close();
  }
}

bootstrap().catch((error) => {
  console.error('Failed to collect market data:', error);
  process.exit(1);
});
