import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { datasetsConfig } from '@/config/datasets.config';
import { DatasetsModule } from '@/modules/datasets/datasets.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, load: [datasetsConfig] }), DatasetsModule],
  controllers: [],
  providers: [],
})
export class AppModule {}
