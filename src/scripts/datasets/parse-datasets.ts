import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from '@/app.module';
import { DatasetParserService } from '@/modules/datasets/application/services/dataset-parser.service';
import {
  DATASET_WRITER,
  type DatasetWriterPort,
} from '@/modules/datasets/application/ports/dataset-writer.port';

const logger = new Logger('DatasetParser');

interface ParseOptions {
  dryRun: boolean;
  skipPopulation: boolean;
  onlyPopulation: boolean;
}

function parseArgs(): ParseOptions {
  const args = process.argv.slice(2);

  return {
    dryRun: args.includes('--dry-run'),
    skipPopulation: args.includes('--skip-population'),
    onlyPopulation: args.includes('--only-population'),
  };
}

async function run() {
  const options = parseArgs();

  if (options.onlyPopulation && options.skipPopulation) {
    logger.error('❌ Erro: --only-population e --skip-population não podem ser usados juntos');
    process.exit(1);
  }

  logger.log('🚀 Iniciando processamento dos datasets...');
  logger.log(
    `📋 Opções: dryRun=${options.dryRun}, skipPopulation=${options.skipPopulation}, onlyPopulation=${options.onlyPopulation}`,
  );

  const ctx = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log', 'debug'],
  });

  const parser = ctx.get(DatasetParserService, { strict: false });
  const writer = ctx.get<DatasetWriterPort>(DATASET_WRITER, { strict: false });

  try {
    if (!options.onlyPopulation) {
      const { confirmed, deaths, recovered } = await parser.parseTimeSeries();

      logger.log(`📊 Séries: confirmed=${confirmed.length}, deaths=${deaths.length}, recovered=${recovered.length}`);

      if (!options.dryRun) {
        const files = await writer.writeByPlace([...confirmed, ...deaths, ...recovered]);
        logger.log(`   Arquivos por local: ${files.length}`);
      }
    }

    if (!options.skipPopulation) {
      const histories = await parser.parsePopulation();

      logger.log(`📊 População: ${histories.length} países`);

      if (!options.dryRun) {
        const file = await writer.writePopulation(histories);
        logger.log(`   Histórico gravado em ${file}`);
      }
    }

    logger.log('✅ PROCESSAMENTO CONCLUÍDO');
  } catch (error) {
    logger.error(`❌ Erro durante processamento: ${(error as Error).message}`);
    logger.error((error as Error).stack);
    throw error;
  } finally {
    await ctx.close();
  }
}

run().catch((error) => {
  logger.error(`❌ Erro crítico: ${(error as Error).stack}`);
  process.exit(1);
});
