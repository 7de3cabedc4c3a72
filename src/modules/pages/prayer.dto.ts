import { Transform } from 'class-transformer';
import { IsInt, IsOptional, IsString, Min, MinLength } from 'class-validator';

const toInt = ({ value }: { value: unknown }) => (typeof value === 'string' && /^\d+$/.test(value) ? parseInt(value, 10) : value);

export class ProcessPrayerDto {
  @Transform(toInt)
  @IsInt()
  @Min(1)
  id!: number;
}

export class PutBackDto {
  @Transform(toInt)
  @IsInt()
  @Min(1)
  id!: number;

  @IsString()
  @MinLength(1)
  country_code!: string;
}

export class PutBackFormDto {
  @IsString()
  @MinLength(1)
  person_name!: string;

  @IsOptional()
  @IsString()
  post_label?: string;

  @IsString()
  @MinLength(1)
  country_code!: string;
}
