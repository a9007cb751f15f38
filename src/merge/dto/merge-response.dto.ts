import { ApiProperty } from '@nestjs/swagger';

export class MergeResponseDto {
  @ApiProperty({ example: 'success', enum: ['success'] })
  status!: 'success';

  @ApiProperty({ example: '20260105_090703_1a2b3c4d' })
  jobId!: string;

  @ApiProperty({ example: 'merged_20260105_090703_1a2b3c4d.pdf' })
  filename!: string;

  @ApiProperty({ example: '/api/v1/merge/download/merged_20260105_090703_1a2b3c4d.pdf' })
  downloadUrl!: string;

  @ApiProperty({ example: 48213, description: 'Tamaño del PDF en bytes' })
  size!: number;
}

export class MergeErrorResponseDto {
  @ApiProperty({ example: 415 })
  statusCode!: number;

  @ApiProperty({ example: 'UNSUPPORTED_FORMAT' })
  error!: string;

  @ApiProperty({ example: 'Formato de archivo no soportado ".txt" en "notas.txt"' })
  message!: string;
}
