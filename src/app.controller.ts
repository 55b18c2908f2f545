import { Controller, Get, Inject } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { CLOCK, Clock } from './common/clock/clock';

export const SERVICE_NAME = 'portfolio-valuation-engine';

@Controller()
export class AppController {
  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  /**
   * Health check for load balancers and monitoring.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: this.clock.now().toISOString(),
      uptime: process.uptime(),
      service: SERVICE_NAME,
    };
  }

  /**
   * API root - returns service info and available endpoints.
   *
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Portfolio Accounting & Valuation Engine',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        transactions: '/transactions',
        events: '/transactions/events',
        positions: '/portfolio/positions',
        pnl: '/portfolio/pnl',
        cash: '/portfolio/cash',
        timeline: '/portfolio/timeline',
        performance: '/portfolio/performance/:symbol',
        risk: '/portfolio/risk',
        dashboard: '/portfolio/dashboard',
        sectors: '/portfolio/sectors',
        prices: '/market-data/prices',
      },
    };
  }
}
