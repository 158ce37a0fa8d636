// Nest Modules
import { Global, Module } from '@nestjs/common';

// Constants
import { INJECTION_TOKENS } from './constants/injection-tokens';
import { systemClock } from './time/clock';

@Global()
@Module({
  providers: [{ provide: INJECTION_TOKENS.CLOCK, useValue: systemClock }],
  exports: [INJECTION_TOKENS.CLOCK],
})
export class CommonModule {}
