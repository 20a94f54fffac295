import { IsNumber, IsOptional, Max, Min } from 'class-validator';

/** Either a geographic point to place on screen, or a screen point to locate. */
export class ProjectQueryDto {
  @IsOptional()
  @IsNumber()
  @Min(-90)
  @Max(90)
  latitude?: number;

  @IsOptional()
  @IsNumber()
  @Min(-180)
  @Max(180)
  longitude?: number;

  @IsOptional()
  @IsNumber()
  x?: number;

  @IsOptional()
  @IsNumber()
  y?: number;
}
