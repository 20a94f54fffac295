import { IsInt, IsNumber, IsOptional, IsString, Length, Max, Min } from 'class-validator';

/** Omitted coordinates and zoom level are taken from the current view. */
export class CreateBookmarkDto {
  @IsString({ message: 'Bookmark name must be a string' })
  @Length(1, 64, { message: 'Bookmark name must be between 1 and 64 characters' })
  name!: string;

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
  @IsInt({ message: 'zoomLevel must be an integer' })
  @Min(0)
  @Max(19)
  zoomLevel?: number;
}
