import { IsNumber, IsOptional, IsPositive } from 'class-validator';

export class PinchDto {
  /** Multiplier applied to the current continuous zoom. */
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive({ message: 'factor must be greater than zero' })
  factor!: number;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  cursorX?: number;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  cursorY?: number;
}
