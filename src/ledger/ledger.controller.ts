import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { LedgerService, toTransactionResponse } from './ledger.service';
import { CreateTransactionDto } from './dto/create-transaction.dto';
import { ApplyCorporateEventDto } from './dto/apply-corporate-event.dto';
import { LedgerQueryDto } from './dto/ledger-query.dto';
import { RecordTransactionResponseDto, TransactionResponseDto } from './dto/transaction-response.dto';

@Controller('transactions')
export class LedgerController {
  constructor(private readonly ledgerService: LedgerService) {}

  /**
   * Records a transaction.
   * Idempotent - duplicate id returns 201 with existing record.
   *
   * POST /transactions
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  record(@Body() dto: CreateTransactionDto): RecordTransactionResponseDto {
    const { transaction, duplicate } = this.ledgerService.record(dto);
    return {
      ...toTransactionResponse(transaction),
      message: duplicate ? 'Transaction already recorded (idempotent)' : 'Transaction recorded successfully',
      duplicate,
    };
  }

  /**
   * Date-ordered ledger, optionally filtered.
   *
   * GET /transactions?symbol=THYAO&from=2024-01-01&to=2024-06-30
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  list(@Query() query: LedgerQueryDto): TransactionResponseDto[] {
    return this.ledgerService.getLedger(query).map(toTransactionResponse);
  }

  /**
   * Applies a percentage dividend or bonus issue to current holdings.
   * 404 when no shares are held before the event date.
   *
   * POST /transactions/events
   */
  @Post('events')
  @HttpCode(HttpStatus.CREATED)
  applyEvent(@Body() dto: ApplyCorporateEventDto): TransactionResponseDto {
    return toTransactionResponse(this.ledgerService.applyCorporateEvent(dto));
  }
}
