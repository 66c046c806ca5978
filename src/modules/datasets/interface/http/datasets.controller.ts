import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  Logger,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { DatasetError } from '@/modules/datasets/domain/dataset-errors';
import type { CovidItem } from '@/modules/datasets/domain/covid-item';
import type { CountryPopulationHistory } from '@/modules/datasets/domain/population-history';
import { UploadTimeSeriesDto } from '@/modules/datasets/application/dto/upload-timeseries.dto';
import {
  DatasetParserService,
  type UploadedTable,
} from '@/modules/datasets/application/services/dataset-parser.service';

const uploadInterceptor = FileInterceptor('file', {
  storage: memoryStorage(),
  limits: {
    fileSize: 50 * 1024 * 1024, // 50MB
  },
});

@Controller('datasets')
export class DatasetsController {
  private readonly logger = new Logger(DatasetsController.name);

  constructor(private readonly parser: DatasetParserService) {}

  @Post('timeseries')
  @HttpCode(200)
  @UseInterceptors(uploadInterceptor)
  timeseries(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() body: UploadTimeSeriesDto,
  ): CovidItem[] {
    const upload = this.toUpload(file);
    return this.run(() => this.parser.projectUpload(upload, body.status));
  }

  @Post('population')
  @HttpCode(200)
  @UseInterceptors(uploadInterceptor)
  population(@UploadedFile() file: Express.Multer.File | undefined): CountryPopulationHistory[] {
    const upload = this.toUpload(file);
    return this.run(() => this.parser.projectPopulationUpload(upload));
  }

  private toUpload(file: Express.Multer.File | undefined): UploadedTable {
    if (!file) {
      throw new BadRequestException('Arquivo ausente. Envie o arquivo no campo "file" como form-data.');
    }
    if (!file.buffer || file.buffer.length === 0) {
      throw new BadRequestException('Arquivo está vazio ou inválido.');
    }

    this.logger.log(`Arquivo recebido: ${file.originalname} (${file.size} bytes, ${file.mimetype})`);
    return { buffer: file.buffer, originalName: file.originalname, mimeType: file.mimetype };
  }

  private run<T>(task: () => T): T {
    try {
      return task();
    } catch (err) {
      if (err instanceof DatasetError) {
        this.logger.warn(`[${err.code}] ${err.message}`);
        throw new BadRequestException({ code: err.code, message: err.message });
      }
      throw err;
    }
  }
}
