import type { TradingVenue, VenuePendingOrder } from '../../exchanges/venue';
import type { GuardDecision } from '../../guard/gridGuards';
import { logger } from '../../utils/logger';
import { formatError } from '../../utils/formatError';
import { gridOrdersPlacedCounter, gridOrderRejectCounter } from '../../telemetry/metrics';
import type { OrderSide } from '../types';
import { OrderRejectedError, callVenue } from './errors';
import type { EngineEventSink } from './events';
import { layerKeyId, layerTag, transitionOrder } from './gridState';
import { sizeLayer } from './positionSizer';
import type { GridOrder, GridState, LadderParams, LayerKey, PatternSignal } from './types';

export const DEFAULT_DUPLICATE_TOLERANCE = 1e-4;

export interface LayerPlan {
  key: LayerKey;
  /** 0 = layer at the anchor, 1 and 2 extend outward */
  layer: number;
  entryPrice: number;
  targetPrice: number;
  volume: number;
}

export interface BuildInput {
  state: GridState;
  anchorIndex: number;
  referencePrice: number;
  decision: GuardDecision;
  pattern: PatternSignal;
}

export interface BuildResult {
  placed: GridOrder[];
  duplicates: GridOrder[];
  suppressed: LayerKey[];
  rejected: LayerKey[];
  failed: LayerKey[];
  blocked: boolean;
}

const LAYERS_PER_SIDE = 3;

function spacingWeight(index: number, percentScale: number): number {
  return 1 + (Math.abs(index) / 100) * percentScale;
}

function planSide(
  side: OrderSide,
  anchorIndex: number,
  referencePrice: number,
  baseAmount: number,
  params: LadderParams
): LayerPlan[] {
  const direction = side === 'buy' ? 1 : -1;
  const plans: LayerPlan[] = [];
  let carried = 0;
  for (let layer = 0; layer < LAYERS_PER_SIDE; layer += 1) {
    const index = anchorIndex + direction * layer;
    const weight = spacingWeight(index, params.percentScale);
    const entryPrice = referencePrice + direction * (carried + params.entryDelta * weight);
    const targetPrice = entryPrice + direction * params.profitDistance * weight;
    plans.push({
      key: { side, index },
      layer,
      entryPrice,
      targetPrice,
      volume: sizeLayer(baseAmount, params.scalingTable, index),
    });
    carried += params.profitDistance * weight;
  }
  return plans;
}

/**
 * Three buy-stop layers above the reference and three sell-stop layers below,
 * interleaved nearest-first (buy 0, sell 0, buy 1, sell 1, ...).
 */
export function planLadder(
  anchorIndex: number,
  referencePrice: number,
  baseAmount: number,
  params: LadderParams
): LayerPlan[] {
  const buys = planSide('buy', anchorIndex, referencePrice, baseAmount, params);
  const sells = planSide('sell', anchorIndex, referencePrice, baseAmount, params);
  const ladder: LayerPlan[] = [];
  for (let layer = 0; layer < LAYERS_PER_SIDE; layer += 1) {
    ladder.push(buys[layer], sells[layer]);
  }
  return ladder;
}

export class PendingOrderIndex {
  private readonly buckets = new Map<string, VenuePendingOrder[]>();

  constructor(private readonly tolerance: number, orders: VenuePendingOrder[] = []) {
    orders.forEach((order) => this.add(order));
  }

  private bucketOf(price: number) {
    return Math.round(price / this.tolerance);
  }

  add(order: VenuePendingOrder) {
    const key = `${order.side}:${this.bucketOf(order.openPrice)}`;
    const list = this.buckets.get(key) ?? [];
    list.push(order);
    this.buckets.set(key, list);
  }

  find(side: OrderSide, price: number): VenuePendingOrder | null {
    const bucket = this.bucketOf(price);
    for (const candidate of [bucket, bucket - 1, bucket + 1]) {
      const list = this.buckets.get(`${side}:${candidate}`);
      const match = list?.find((order) => Math.abs(order.openPrice - price) < this.tolerance);
      if (match) return match;
    }
    return null;
  }
}

export interface GridBuilderOptions {
  venue: TradingVenue;
  symbol: string;
  tagPrefix: string;
  accountId: string;
  ladder: LadderParams;
  events: EngineEventSink;
  clock?: () => number;
}

export class GridBuilder {
  private readonly clock: () => number;

  constructor(private readonly options: GridBuilderOptions) {
    this.clock = options.clock ?? Date.now;
  }

  plan(anchorIndex: number, referencePrice: number, baseAmount: number) {
    return planLadder(anchorIndex, referencePrice, baseAmount, this.options.ladder);
  }

  /** Volume the ladder would add for layers that are not yet resting or open. */
  proposedVolume(state: GridState, anchorIndex: number, referencePrice: number): number {
    return this.plan(anchorIndex, referencePrice, state.baseAmount)
      .filter((plan) => {
        const slot = state.orders.get(layerKeyId(plan.key));
        return !slot || slot.status === 'unplaced';
      })
      .reduce((sum, plan) => sum + plan.volume, 0);
  }

  async buildAt(input: BuildInput): Promise<BuildResult> {
    const { state, anchorIndex, referencePrice, decision, pattern } = input;
    const { venue, symbol, accountId, events } = this.options;
    const result: BuildResult = { placed: [], duplicates: [], suppressed: [], rejected: [], failed: [], blocked: false };

    if (!decision.allowed) {
      result.blocked = true;
      logger.info('grid_build_blocked', {
        event: 'grid_build_blocked',
        accountId,
        symbol,
        anchorIndex,
        reason: decision.reason,
      });
      return result;
    }

    const plans = this.plan(anchorIndex, referencePrice, state.baseAmount);

    let pendingIndex: PendingOrderIndex;
    try {
      const pending = await callVenue('listPendingOrders', () => venue.listPendingOrders(symbol));
      pendingIndex = new PendingOrderIndex(this.options.ladder.duplicateTolerance, pending);
    } catch (error) {
      logger.error('grid_build_pending_lookup_failed', {
        event: 'grid_build_pending_lookup_failed',
        accountId,
        symbol,
        anchorIndex,
        error: formatError(error),
      });
      result.failed.push(...plans.map((plan) => plan.key));
      return result;
    }

    for (const plan of plans) {
      const id = layerKeyId(plan.key);
      const slot = state.orders.get(id);
      if (slot && slot.status !== 'unplaced') continue;

      const suppressed = plan.key.side === 'buy' ? pattern.suppressNextBuy : pattern.suppressNextSell;
      if (plan.layer === 0 && suppressed) {
        result.suppressed.push(plan.key);
        logger.warn('grid_layer_suppressed', {
          event: 'grid_layer_suppressed',
          accountId,
          layer: id,
          buyRun: pattern.buyRun,
          sellRun: pattern.sellRun,
        });
        continue;
      }

      const draft: GridOrder = {
        key: plan.key,
        status: 'unplaced',
        entryPrice: plan.entryPrice,
        targetPrice: plan.targetPrice,
        volume: plan.volume,
        tag: layerTag(this.options.tagPrefix, plan.key, state.cycleNumber),
      };

      const existing = pendingIndex.find(plan.key.side, plan.entryPrice);
      if (existing) {
        const adopted = transitionOrder({ ...draft, venueOrderId: existing.id }, 'placed', this.clock());
        state.orders.set(id, adopted);
        result.duplicates.push(adopted);
        logger.info('grid_duplicate_suppressed', {
          event: 'grid_duplicate_suppressed',
          accountId,
          layer: id,
          price: plan.entryPrice,
          venueOrderId: existing.id,
        });
        continue;
      }

      try {
        const ack = await callVenue('placeConditionalOrder', () =>
          venue.placeConditionalOrder({
            symbol,
            side: plan.key.side,
            price: plan.entryPrice,
            targetPrice: plan.targetPrice,
            volume: plan.volume,
            tag: draft.tag,
          })
        );
        const placed = transitionOrder({ ...draft, venueOrderId: ack.venueOrderId }, 'placed', this.clock());
        state.orders.set(id, placed);
        pendingIndex.add({
          id: ack.venueOrderId,
          symbol,
          side: plan.key.side,
          openPrice: plan.entryPrice,
          volume: plan.volume,
          tag: draft.tag,
        });
        result.placed.push(placed);
        gridOrdersPlacedCounter.labels(accountId, plan.key.side).inc();
        logger.info('grid_order_placed', {
          event: 'grid_order_placed',
          accountId,
          layer: id,
          venueOrderId: ack.venueOrderId,
          entryPrice: plan.entryPrice,
          targetPrice: plan.targetPrice,
          volume: plan.volume,
        });
      } catch (error) {
        if (error instanceof OrderRejectedError) {
          result.rejected.push(plan.key);
          gridOrderRejectCounter.labels(accountId, plan.key.side).inc();
          logger.warn('grid_order_rejected', {
            event: 'grid_order_rejected',
            accountId,
            layer: id,
            error: formatError(error),
          });
          await events.publish({ type: 'order_rejected', key: plan.key, entryPrice: plan.entryPrice, reason: error.message });
        } else {
          result.failed.push(plan.key);
          logger.error('grid_order_submit_failed', {
            event: 'grid_order_submit_failed',
            accountId,
            layer: id,
            error: formatError(error),
          });
        }
      }
    }

    if (result.placed.length) {
      await events.publish({ type: 'order_placed', anchorIndex, referencePrice, orders: result.placed });
    }
    return result;
  }
}
