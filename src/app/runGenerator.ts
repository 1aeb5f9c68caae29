import { loadGeneratorParameters } from "../config/generator-config";
import { SimulationFactory } from "../domain/factories/SimulationFactory";
import { RecordWriterFactory } from "../adapters/output/RecordWriterFactory";
import { RunSummary, SimulationParameters } from "../utils/shared";
import { formatDateTime } from "../utils/clock";
import { logger } from "../utils/logger";

export interface GeneratorRun {
  parameters: SimulationParameters;
  outputPath: string;
  summary: RunSummary;
}

/**
 * Loads the settings, simulates the whole order and writes the output file.
 * Generation completes in memory before anything is written.
 */
export async function runGenerator(configPath: string): Promise<GeneratorRun> {
  const parameters = loadGeneratorParameters(configPath);

  const simulation = SimulationFactory.create(parameters, {
    onLotChanged: (lot, changeoverMs) => {
      logger().debug(`[BOOT] Lot ${lot.id} minted at ${formatDateTime(lot.mintedAt)} (changeover ${changeoverMs} ms)`);
    },
  });
  const result = simulation.run();

  const { filename, format } = parameters.output;
  const writer = RecordWriterFactory.create(format);
  await writer.write(result.records, filename);

  logger().info(`[Output] ${result.records.length} records written to ${filename} (${format})`);
  logger().info(`[Output] Total parts produced: ${result.summary.completeCount}`);

  return { parameters, outputPath: filename, summary: result.summary };
}
