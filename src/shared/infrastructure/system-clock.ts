import { Injectable } from '@nestjs/common';
import type { Clock } from '../domain/clock.port';

/**
 * System clock implementation - uses real wall-clock time.
 * The simulated clock takes its base time from here once at startup.
 */
@Injectable()
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}
