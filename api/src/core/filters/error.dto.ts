import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/** Body written by HttpErrorFilter. */
export class ErrorDto {
  @ApiProperty() error!: string;
  @ApiProperty() message!: string;
  @ApiProperty() statusCode!: number;
  @ApiPropertyOptional() requestId?: string;
  @ApiProperty() path!: string;
  @ApiProperty() timestamp!: string;
}
