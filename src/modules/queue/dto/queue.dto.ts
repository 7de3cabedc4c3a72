import { Transform } from 'class-transformer';
import { ArrayMaxSize, IsArray, IsInt, IsOptional, IsString, Min } from 'class-validator';

const toList = ({ value }: { value: unknown }) => {
  if (typeof value === 'string') return value.split(',').map((v) => v.trim()).filter((v) => v.length > 0);
  return value;
};

export class RepresentativeIdParam {
  @Transform(({ value }) => (typeof value === 'string' && /^\d+$/.test(value) ? parseInt(value, 10) : value))
  @IsInt()
  @Min(1)
  id!: number;
}

export class NextInQueueQuery {
  @IsOptional()
  @IsString()
  country?: string;
}

export class PurgeQueueDto {
  @IsOptional()
  @Transform(toList)
  @IsArray()
  @ArrayMaxSize(50)
  @IsString({ each: true })
  countries?: string[];
}
