import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsNumberString,
} from 'class-validator';
import { toDecimalStringList } from '../../../shared/common/transform.util';

export class RecalculateDiscountBatchDto {
  @ApiProperty({ type: [String], example: ['1001', '1002'] })
  @Transform(toDecimalStringList)
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(10_000)
  @IsNumberString({ no_symbols: true }, { each: true })
  transactionIds!: string[];
}

export class DiscountRecalculationResultDto {
  @ApiProperty() totalTransactions!: number;
  @ApiProperty() updatedCount!: number;
  @ApiProperty({ example: '1520.40' }) totalDiscount!: string;
}

export class DiscountUpdateDto {
  @ApiProperty() transactionId!: string;
  @ApiProperty() oldDiscount!: string;
  @ApiProperty() newDiscount!: string;
  @ApiProperty() updated!: boolean;
  @ApiProperty() changed!: boolean;
}

export class DiscountCalculationDto {
  @ApiProperty() transactionId!: string;
  @ApiProperty() itemCount!: number;
  @ApiProperty() lineTotal!: string;
  @ApiProperty({ nullable: true, type: String }) payedSum!: string | null;
  @ApiProperty({ nullable: true, type: String }) payedBonus!: string | null;
  @ApiProperty() discount!: string;
}
