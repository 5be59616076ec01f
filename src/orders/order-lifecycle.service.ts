import { Injectable } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';
import type { OrderTransitionEvent } from './orders.types';

@Injectable()
export class OrderLifecycleService {
  private readonly eventStream = new Subject<OrderTransitionEvent>();

  events(): Observable<OrderTransitionEvent> {
    return this.eventStream.asObservable();
  }

  emit(
    payload: Omit<OrderTransitionEvent, 'at'> & { at?: string },
  ): void {
    this.eventStream.next({
      ...payload,
      at: payload.at ?? new Date().toISOString(),
    });
  }
}
