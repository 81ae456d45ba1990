import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { CLOCK } from '../../shared/domain/clock.port';
import { SystemClock } from '../../shared/infrastructure/system-clock';
import { ClockAcceleratorService } from './application/clock-accelerator.service';

@Module({
  imports: [ScheduleModule.forRoot()],
  providers: [
    // Real time, the base the simulated clock starts from
    {
      provide: CLOCK,
      useClass: SystemClock,
    },
    ClockAcceleratorService,
  ],
  exports: [ClockAcceleratorService],
})
export class ClockModule {}
