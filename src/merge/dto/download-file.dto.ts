import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, TransformFnParams } from 'class-transformer';
import { IsBoolean, IsOptional, Matches } from 'class-validator';
import { OUTPUT_NAME_PATTERN } from '../../helpers/formatDate';

export const parseBooleanFlag = (value: unknown): unknown => {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  const normalized = String(value).toLowerCase().trim();
  if (['1', 'true', 'on', 'yes'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'off', 'no'].includes(normalized)) {
    return false;
  }
  return value;
};

export class DownloadParamsDto {
  @ApiProperty({ example: 'merged_20260105_090703_1a2b3c4d.pdf' })
  @Matches(OUTPUT_NAME_PATTERN, { message: 'filename no corresponde a un PDF generado' })
  filename!: string;
}

export class DownloadQueryDto {
  @ApiPropertyOptional({
    description: 'Muestra el PDF en el navegador en lugar de descargarlo',
    type: Boolean,
  })
  @IsOptional()
  @IsBoolean()
  // Se lee el valor crudo: la conversión implícita haría true de 'false'
  @Transform(({ obj, key }: TransformFnParams) => parseBooleanFlag(obj[key]))
  inline?: boolean;
}
