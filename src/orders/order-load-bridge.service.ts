import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { EMPTY, Subscription, catchError, from, mergeMap } from 'rxjs';
import { LoadCounterService } from '../kitchen-load/load-counter.service';
import { OrderLifecycleService } from './order-lifecycle.service';
import { isActiveStatus } from './order-status';
import type { OrderStatus } from './order-status';
import type { OrderTransitionEvent } from './orders.types';

export type LoadAdjustment = 'increment' | 'decrement' | 'none';

export function loadAdjustmentFor(
  previousStatus: OrderStatus | null,
  nextStatus: OrderStatus | null,
): LoadAdjustment {
  const wasActive = isActiveStatus(previousStatus);
  const isActive = isActiveStatus(nextStatus);
  if (!wasActive && isActive) {
    return 'increment';
  }
  if (wasActive && !isActive) {
    return 'decrement';
  }
  return 'none';
}

/**
 * Keeps the load counter in step with order transitions. The only component
 * that increments or decrements it: one call per change of active-set
 * membership, none otherwise.
 */
@Injectable()
export class OrderLoadBridge implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(OrderLoadBridge.name);
  private subscription?: Subscription;

  constructor(
    private readonly lifecycle: OrderLifecycleService,
    private readonly loadCounter: LoadCounterService,
  ) {}

  onModuleInit(): void {
    this.subscription = this.lifecycle
      .events()
      .pipe(
        mergeMap((event) =>
          from(this.apply(event)).pipe(
            catchError((error: unknown) => {
              this.logger.error(
                `Failed to apply ${event.kind} of order ${event.orderId}`,
                error instanceof Error ? error.stack : String(error),
              );
              return EMPTY;
            }),
          ),
        ),
      )
      .subscribe();
  }

  onModuleDestroy(): void {
    this.subscription?.unsubscribe();
  }

  async apply(event: OrderTransitionEvent): Promise<LoadAdjustment> {
    const adjustment = loadAdjustmentFor(event.previousStatus, event.nextStatus);
    const transition = `${event.previousStatus ?? 'none'} → ${event.nextStatus ?? 'none'}`;
    switch (adjustment) {
      case 'increment': {
        const count = await this.loadCounter.increment(event.locationId);
        this.logger.log(
          `Order ${event.orderId} became active (${transition}), location ${event.locationId} now at ${count}`,
        );
        break;
      }
      case 'decrement': {
        const count = await this.loadCounter.decrement(event.locationId);
        this.logger.log(
          `Order ${event.orderId} became inactive (${transition}), location ${event.locationId} now at ${count}`,
        );
        break;
      }
      default:
        this.logger.debug(`Order ${event.orderId} ${event.kind} (${transition}) leaves load unchanged`);
    }
    return adjustment;
  }
}
