import { IsIn, IsOptional, IsString, MaxLength } from 'class-validator';
import { SyncConfigOverrides } from '../../config/app.config';

const DELIMITERS = [',', ';', '\t', '|'];

/** Optional multipart text fields sent next to the two files. */
export class SyncOptionsDto implements SyncConfigOverrides {
  @IsOptional()
  @IsIn(DELIMITERS)
  physicalDelimiter?: string;

  @IsOptional()
  @IsIn(DELIMITERS)
  shopifyDelimiter?: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  physicalBarcodeColumn?: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  physicalNameColumn?: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  physicalQuantityColumn?: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  shopifyBarcodeColumn?: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  shopifyQuantityColumn?: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  shopifyProductIdColumn?: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  shopifyVariantColumn?: string;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  oneSizeLabel?: string;
}
