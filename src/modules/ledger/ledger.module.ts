import { Module } from '@nestjs/common';

import { LedgerReaderService } from './ledger-reader.service';
import { SubtensorLedgerAdapter } from './subtensor-ledger.adapter';
import { LEDGER_CLIENT } from '../../core/ports/ports.tokens';

@Module({
  providers: [
    SubtensorLedgerAdapter,
    { provide: LEDGER_CLIENT, useExisting: SubtensorLedgerAdapter },
    LedgerReaderService,
  ],
  exports: [LEDGER_CLIENT, LedgerReaderService],
})
export class LedgerModule {}
