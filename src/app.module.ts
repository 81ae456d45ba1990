import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { agendaConfig } from './config/agenda.config';
import { validateEnvironment } from './config/env.validation';
import { AgendaModule } from './modules/agenda/agenda.module';
import { EventsModule } from './shared/events';
import { TerminalModule } from './shared/terminal';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [agendaConfig],
      validate: validateEnvironment,
    }),
    EventsModule,
    TerminalModule,
    AgendaModule,
  ],
})
export class AppModule {}
