import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsOptional, IsString, MaxLength } from 'class-validator';
import { toTrimmedString } from '../../../shared/common/transform.util';

export class SetSettingDto {
  @ApiProperty({ example: 'true' })
  @IsString()
  @MaxLength(10_000)
  value!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @Transform(toTrimmedString)
  @IsString()
  @MaxLength(1000)
  description?: string;
}

export class SettingDto {
  @ApiProperty() key!: string;
  @ApiProperty() value!: string;
  @ApiPropertyOptional({ nullable: true }) description!: string | null;
  @ApiProperty() createdAt!: string;
  @ApiProperty() updatedAt!: string;
}
