import { Module } from '@nestjs/common';
import { ClockModule } from '../clock/clock.module';

// Application
import { ActivityMatcher } from './application/activity-matcher.service';
import { AgendaConsole } from './application/agenda-console';
import { AgendaRunner } from './application/agenda.runner';
import { AgendaEventHandlers } from './application/event-handlers/agenda.event-handlers';
import { InteractionGate } from './application/interaction-gate.service';
import { PollLoopService } from './application/poll-loop.service';
import { SpeedFactorPrompt } from './application/speed-factor.prompt';
import { TimeQueryService } from './application/time-query.service';

// Repository
import { SCHEDULE_REPOSITORY } from './domain/schedule.repository';
import { JsonScheduleRepository } from './infrastructure/json-schedule.repository';

@Module({
  imports: [ClockModule],
  providers: [
    AgendaConsole,
    InteractionGate,
    ActivityMatcher,
    TimeQueryService,
    SpeedFactorPrompt,
    PollLoopService,
    AgendaEventHandlers,
    AgendaRunner,

    // Repository (infrastructure adapter)
    {
      provide: SCHEDULE_REPOSITORY,
      useClass: JsonScheduleRepository,
    },
  ],
  exports: [AgendaRunner],
})
export class AgendaModule {}
