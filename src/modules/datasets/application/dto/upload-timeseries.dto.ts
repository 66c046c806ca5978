import { IsIn } from 'class-validator';
import { COVID_STATUSES, type CovidStatus } from '@/modules/datasets/domain/covid-item';

export class UploadTimeSeriesDto {
  @IsIn(COVID_STATUSES)
  status!: CovidStatus;
}
