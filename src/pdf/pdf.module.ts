import { Module } from '@nestjs/common';
import { PdfLibRepository } from './infrastructure/pdf-lib.repository';
import { PDF_REPOSITORY } from './domain/repositories/pdf.repository';
import { IMAGE_DECODER_REPOSITORY } from './domain/repositories/image-decoder.repository';
import { SharpImageDecoderRepository } from './infrastructure/sharp-image-decoder.repository';
import { ImageToDocumentConverter } from './services/image-to-document.converter';
import { DocumentAssembler } from './services/document-assembler';

@Module({
	providers: [
		{
			provide: PDF_REPOSITORY,
			useClass: PdfLibRepository,
		},
		{
			provide: IMAGE_DECODER_REPOSITORY,
			useClass: SharpImageDecoderRepository,
		},
		ImageToDocumentConverter,
		DocumentAssembler,
	],
	exports: [ImageToDocumentConverter, DocumentAssembler],
})
export class PdfModule {}
