import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  Res,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FilesInterceptor } from '@nestjs/platform-express';
import {
  ApiBody,
  ApiConsumes,
  ApiOkResponse,
  ApiOperation,
  ApiProduces,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import type { Response } from 'express';
import { envs } from '../config/envs';
import { DownloadParamsDto, DownloadQueryDto } from './dto/download-file.dto';
import { MergeErrorResponseDto, MergeResponseDto } from './dto/merge-response.dto';
import { MergeService } from './merge.service';
import { mergeUploadFileFilter } from './utils/upload-file-filter';

@ApiTags('Merge')
@Controller('merge')
export class MergeController {
  constructor(private readonly mergeService: MergeService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(
    FilesInterceptor('files', envs.maxFiles, {
      limits: { fileSize: envs.maxFileSizeBytes },
      fileFilter: mergeUploadFileFilter,
    }),
  )
  @ApiOperation({ summary: 'Une PDFs e imágenes en un único PDF, en el orden enviado' })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: {
        files: { type: 'array', items: { type: 'string', format: 'binary' } },
      },
    },
  })
  @ApiOkResponse({ type: MergeResponseDto })
  @ApiResponse({ status: HttpStatus.UNSUPPORTED_MEDIA_TYPE, type: MergeErrorResponseDto })
  @ApiResponse({ status: HttpStatus.UNPROCESSABLE_ENTITY, type: MergeErrorResponseDto })
  merge(
    @UploadedFiles() files: Express.Multer.File[] | undefined,
    @Res({ passthrough: true }) res: Response,
  ): Promise<MergeResponseDto> {
    // Si el cliente corta antes de recibir la respuesta, el trabajo se cancela
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    return this.mergeService.mergeUploads(files, controller.signal);
  }

  @Get('download/:filename')
  @ApiOperation({ summary: 'Descarga un PDF generado' })
  @ApiProduces('application/pdf')
  async download(
    @Param() { filename }: DownloadParamsDto,
    @Query() { inline }: DownloadQueryDto,
    @Res() res: Response,
  ) {
    const pdf = await this.mergeService.getOutput(filename);

    res.setHeader('Content-Type', 'application/pdf');
    res.setHeader(
      'Content-Disposition',
      `${inline ? 'inline' : 'attachment'}; filename="${filename}"`,
    );
    res.setHeader('Content-Length', pdf.length.toString());
    return res.send(pdf);
  }
}
