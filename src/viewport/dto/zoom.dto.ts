import { IsIn, IsNumber, IsOptional } from 'class-validator';
import { ScrollUnit } from '../zoom-controller';

export class ZoomDto {
  /** Wheel delta; negative zooms in. */
  @IsNumber({ allowNaN: false, allowInfinity: false }, { message: 'delta must be a finite number' })
  delta!: number;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  cursorX?: number;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  cursorY?: number;

  @IsOptional()
  @IsIn(['line', 'pixel'], { message: 'unit must be "line" or "pixel"' })
  unit?: ScrollUnit;
}
