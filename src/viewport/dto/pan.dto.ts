import { IsNumber } from 'class-validator';

export class PanDto {
  @IsNumber({ allowNaN: false, allowInfinity: false })
  dx!: number;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  dy!: number;
}
