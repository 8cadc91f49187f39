import { Injectable } from '@nestjs/common';
import type { Clock } from '../domain/clock.port';

/** Wall-clock time of this process. */
@Injectable()
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}
