import { Global, Module } from '@nestjs/common';
import { CLOCK, systemClock } from './clock/clock';

// Process-wide infrastructure available to every feature module.
@Global()
@Module({
  providers: [{ provide: CLOCK, useValue: systemClock }],
  exports: [CLOCK],
})
export class CommonModule {}
