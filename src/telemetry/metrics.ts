import http from 'http';
import { Counter, Gauge, register } from 'prom-client';
import { logger } from '../utils/logger';

const metricsRegistered: { started: boolean } = { started: false };

export const gridOrdersPlacedCounter = new Counter({
  name: 'grid_orders_placed_total',
  help: 'Conditional orders placed on the venue by side',
  labelNames: ['account_id', 'side'] as const,
});

export const gridOrderRejectCounter = new Counter({
  name: 'grid_orders_rejected_total',
  help: 'Conditional orders rejected by the venue by side',
  labelNames: ['account_id', 'side'] as const,
});

export const gridFillCounter = new Counter({
  name: 'grid_fills_total',
  help: 'Grid orders observed as filled by side',
  labelNames: ['account_id', 'side'] as const,
});

export const gridCloseCounter = new Counter({
  name: 'grid_closes_total',
  help: 'Grid positions observed as closed by side',
  labelNames: ['account_id', 'side'] as const,
});

export const cycleCompletedCounter = new Counter({
  name: 'grid_cycles_completed_total',
  help: 'Completed grid cycles',
  labelNames: ['account_id'] as const,
});

export const guardBlockCounter = new Counter({
  name: 'grid_guard_blocks_total',
  help: 'Ticks on which a guard blocked placement, by reason',
  labelNames: ['account_id', 'reason'] as const,
});

export const venueErrorCounter = new Counter({
  name: 'grid_venue_errors_total',
  help: 'Venue calls that failed, by operation',
  labelNames: ['account_id', 'operation'] as const,
});

export const cyclePnlGauge = new Gauge({
  name: 'grid_cycle_pnl_usd',
  help: 'Realized plus unrealized P&L of the running cycle',
  labelNames: ['account_id'] as const,
});

export const sessionProfitGauge = new Gauge({
  name: 'grid_session_profit_usd',
  help: 'Sum of completed cycle P&L since start',
  labelNames: ['account_id'] as const,
});

export const anchorIndexGauge = new Gauge({
  name: 'grid_anchor_index',
  help: 'Current anchor layer index',
  labelNames: ['account_id'] as const,
});

export const controllerStateGauge = new Gauge({
  name: 'grid_controller_running',
  help: '1 when the controller is running, 0 when paused, -1 after an emergency stop',
  labelNames: ['account_id'] as const,
});

export function startMetricsServer(port = Number(process.env.METRICS_PORT || 9100)) {
  if (metricsRegistered.started) return;
  metricsRegistered.started = true;
  const server = http.createServer(async (_req, res) => {
    if (_req.url === '/metrics') {
      try {
        const metrics = await register.metrics();
        res.writeHead(200, { 'Content-Type': register.contentType });
        res.end(metrics);
      } catch (err) {
        res.writeHead(500);
        res.end(String(err));
      }
    } else {
      res.writeHead(404);
      res.end('Not found');
    }
  });
  server.listen(port, () => {
    logger.info('metrics_server_listening', { event: 'metrics_server_listening', port });
  });
}

export function resetMetrics() {
  gridOrdersPlacedCounter.reset();
  gridOrderRejectCounter.reset();
  gridFillCounter.reset();
  gridCloseCounter.reset();
  cycleCompletedCounter.reset();
  guardBlockCounter.reset();
  venueErrorCounter.reset();
  cyclePnlGauge.reset();
  sessionProfitGauge.reset();
  anchorIndexGauge.reset();
  controllerStateGauge.reset();
}
