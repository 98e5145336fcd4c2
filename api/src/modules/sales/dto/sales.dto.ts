import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import {
  IsArray,
  IsNumberString,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import {
  toDecimalString,
  toTrimmedString,
} from '../../../shared/common/transform.util';

const TIMESTAMP_PATTERN =
  /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(?::\d{2}(?:\.\d{1,6})?)?$/;

export class UpsertClientDto {
  @ApiProperty({ example: '42' })
  @Transform(toDecimalString)
  @IsNumberString({ no_symbols: true })
  clientId!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @Transform(toTrimmedString)
  @IsString()
  @MaxLength(255)
  firstname?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @Transform(toTrimmedString)
  @IsString()
  @MaxLength(255)
  lastname?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @Transform(toTrimmedString)
  @IsString()
  @MaxLength(32)
  phone?: string;
}

export class LineItemInputDto {
  @ApiPropertyOptional({ example: '17' })
  @IsOptional()
  @Transform(toDecimalString)
  @IsNumberString({ no_symbols: true })
  productId?: string;

  @ApiPropertyOptional({ example: '1' })
  @IsOptional()
  @Transform(toDecimalString)
  @IsNumberString()
  quantity?: string;

  @ApiProperty({ example: '100.00' })
  @Transform(toDecimalString)
  @IsNumberString()
  sum!: string;
}

export class UpdateLineItemDto {
  @ApiPropertyOptional({ nullable: true, type: String })
  @IsOptional()
  @Transform(toDecimalString)
  @IsNumberString({ no_symbols: true })
  productId?: string | null;

  @ApiPropertyOptional()
  @IsOptional()
  @Transform(toDecimalString)
  @IsNumberString()
  quantity?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @Transform(toDecimalString)
  @IsNumberString()
  sum?: string;
}

export class UpdateTransactionDto {
  @ApiPropertyOptional({ nullable: true, type: String })
  @IsOptional()
  @Transform(toDecimalString)
  @IsNumberString({ no_symbols: true })
  clientId?: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  @IsOptional()
  @Transform(toDecimalString)
  @IsNumberString({ no_symbols: true })
  spotId?: string | null;

  @ApiPropertyOptional({ nullable: true, example: '2025-09-02 14:05:00' })
  @IsOptional()
  @Matches(TIMESTAMP_PATTERN)
  dateClose?: string | null;

  @ApiPropertyOptional({ example: '100.00' })
  @IsOptional()
  @Transform(toDecimalString)
  @IsNumberString()
  sum?: string;

  @ApiPropertyOptional({ nullable: true, type: String })
  @IsOptional()
  @Transform(toDecimalString)
  @IsNumberString()
  payedSum?: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  @IsOptional()
  @Transform(toDecimalString)
  @IsNumberString()
  payedBonus?: string | null;

  @ApiPropertyOptional({ example: '5.00' })
  @IsOptional()
  @Transform(toDecimalString)
  @IsNumberString()
  bonusPercent?: string;
}

export class CreateTransactionDto {
  @ApiProperty({ example: '1001' })
  @Transform(toDecimalString)
  @IsNumberString({ no_symbols: true })
  transactionId!: string;

  @ApiPropertyOptional({ nullable: true, type: String })
  @IsOptional()
  @Transform(toDecimalString)
  @IsNumberString({ no_symbols: true })
  clientId?: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  @IsOptional()
  @Transform(toDecimalString)
  @IsNumberString({ no_symbols: true })
  spotId?: string | null;

  @ApiPropertyOptional({ nullable: true, example: '2025-09-02 14:05:00' })
  @IsOptional()
  @Matches(TIMESTAMP_PATTERN)
  dateClose?: string | null;

  @ApiProperty({ example: '100.00' })
  @Transform(toDecimalString)
  @IsNumberString()
  sum!: string;

  @ApiPropertyOptional({ nullable: true, type: String })
  @IsOptional()
  @Transform(toDecimalString)
  @IsNumberString()
  payedSum?: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  @IsOptional()
  @Transform(toDecimalString)
  @IsNumberString()
  payedBonus?: string | null;

  @ApiPropertyOptional({ example: '5.00' })
  @IsOptional()
  @Transform(toDecimalString)
  @IsNumberString()
  bonusPercent?: string;

  @ApiPropertyOptional({ type: [LineItemInputDto] })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LineItemInputDto)
  items?: LineItemInputDto[];
}
