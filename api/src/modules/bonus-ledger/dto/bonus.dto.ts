import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNumberString,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  NotEquals,
} from 'class-validator';
import {
  toDecimalString,
  toOptionalBoolean,
  toOptionalInt,
  toTrimmedString,
} from '../../../shared/common/transform.util';

export class ToggleTriggersDto {
  @ApiProperty()
  @Transform(toOptionalBoolean)
  @IsBoolean()
  enable!: boolean;
}

export class TriggersStatusDto {
  @ApiProperty({ example: 'Bonus triggers ENABLED successfully' })
  message!: string;
}

export class RecalculateBonusesDto {
  @ApiPropertyOptional({ description: 'Продолжить с сохранённой контрольной точки' })
  @IsOptional()
  @Transform(toOptionalBoolean)
  @IsBoolean()
  resume?: boolean;

  @ApiPropertyOptional({ minimum: 1, maximum: 10000 })
  @IsOptional()
  @Transform(toOptionalInt)
  @IsInt()
  @Min(1)
  @Max(10_000)
  batchSize?: number;
}

export class BonusRecalculationResultDto {
  @ApiProperty() totalTransactions!: number;
  @ApiProperty() updatedTransactions!: number;
  @ApiProperty({ description: 'Минорные единицы' }) totalEarned!: number;
  @ApiProperty({ description: 'Минорные единицы' }) totalSpent!: number;
}

export class AdjustBalanceDto {
  @ApiProperty({ example: '42' })
  @Transform(toDecimalString)
  @IsNumberString({ no_symbols: true })
  clientId!: string;

  @ApiProperty({ description: 'Со знаком, в минорных единицах', example: -500 })
  @Transform(toOptionalInt)
  @IsInt()
  @NotEquals(0)
  amount!: number;

  @ApiProperty({ enum: ['ADJUST', 'EXPIRE'] })
  @IsIn(['ADJUST', 'EXPIRE'])
  operationType!: 'ADJUST' | 'EXPIRE';

  @ApiPropertyOptional()
  @IsOptional()
  @Transform(toTrimmedString)
  @IsString()
  @MaxLength(500)
  description?: string;
}

export class ConsistencyQueryDto {
  @ApiPropertyOptional()
  @IsOptional()
  @Transform(toDecimalString)
  @IsNumberString({ no_symbols: true })
  clientId?: string;
}

export class LimitQueryDto {
  @ApiPropertyOptional({ minimum: 1, maximum: 1000 })
  @IsOptional()
  @Transform(toOptionalInt)
  @IsInt()
  @Min(1)
  @Max(1000)
  limit?: number;
}

export class LedgerEntryDto {
  @ApiProperty() id!: string;
  @ApiProperty() clientId!: string;
  @ApiPropertyOptional({ nullable: true }) transactionId!: string | null;
  @ApiProperty({ enum: ['EARN', 'SPEND', 'ADJUST', 'EXPIRE'] })
  operationType!: string;
  @ApiProperty() amount!: number;
  @ApiProperty() balanceBefore!: number;
  @ApiProperty() balanceAfter!: number;
  @ApiPropertyOptional({ nullable: true }) description!: string | null;
  @ApiPropertyOptional({ nullable: true }) bonusPercent!: string | null;
  @ApiPropertyOptional({ nullable: true }) transactionSum!: string | null;
  @ApiProperty() processedAt!: string;
}

export class ClientBonusDto {
  @ApiProperty() clientId!: string;
  @ApiPropertyOptional({ nullable: true }) name!: string | null;
  @ApiProperty({ description: 'Минорные единицы' }) balance!: number;
  @ApiProperty({ example: '12.50' }) balanceFormatted!: string;
  @ApiProperty({ type: [LedgerEntryDto] }) entries!: LedgerEntryDto[];
}
