import { Global, Module } from '@nestjs/common';
import { TERMINAL } from './terminal.port';
import { TERMINAL_STREAMS, processStreams } from './terminal-streams';
import { StdinTerminal } from './stdin-terminal';

@Global()
@Module({
  providers: [
    {
      provide: TERMINAL_STREAMS,
      useFactory: processStreams,
    },
    {
      provide: TERMINAL,
      useClass: StdinTerminal,
    },
  ],
  exports: [TERMINAL],
})
export class TerminalModule {}
