import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SearchController } from './controllers/search.controller';
import { MetricsController } from './controllers/metrics.controller';
import {
  COMMERCE_QUERY_PORT,
  MESSAGING_PORT,
  METRICS_PORT,
  STOCK_AVAILABILITY_PORT,
} from './application/ports/tokens';
import {
  buildPluginRegistry,
  PluginRegistry,
  resolvePluginFactoryOptions,
} from './application/plugins';
import { StockEvaluator } from './application/services/stock-evaluator';
import { SearchProductsUseCase } from './application/use-cases/search-products';
import { CommerceHttpAdapter } from './infrastructure/adapters/commerce-http';
import { MessagingHttpAdapter } from './infrastructure/adapters/messaging-http';
import { PrometheusMetricsAdapter } from './infrastructure/adapters/metrics';
import { CartSimulationStockAdapter } from './infrastructure/adapters/stock';

@Module({
  controllers: [SearchController, MetricsController],
  providers: [
    SearchProductsUseCase,
    StockEvaluator,
    CommerceHttpAdapter,
    CartSimulationStockAdapter,
    MessagingHttpAdapter,
    PrometheusMetricsAdapter,
    {
      provide: PluginRegistry,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): PluginRegistry =>
        buildPluginRegistry(
          configService.get<string[]>('CONCIERGE_PLUGINS') ?? [],
          resolvePluginFactoryOptions(configService),
        ),
    },
    {
      provide: COMMERCE_QUERY_PORT,
      useExisting: CommerceHttpAdapter,
    },
    {
      provide: STOCK_AVAILABILITY_PORT,
      useExisting: CartSimulationStockAdapter,
    },
    {
      provide: MESSAGING_PORT,
      useExisting: MessagingHttpAdapter,
    },
    {
      provide: METRICS_PORT,
      useExisting: PrometheusMetricsAdapter,
    },
  ],
  exports: [PluginRegistry],
})
export class ConciergeModule {}
