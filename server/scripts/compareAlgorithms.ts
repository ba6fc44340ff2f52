import dotenv from 'dotenv';
import { formatTextReport, runComparison } from '../../simulation/index.js';
import { resolveSimulationDefaults } from '../config.js';

dotenv.config();

function main(): void {
  const config = resolveSimulationDefaults(process.env);
  console.log(
    `Comparing ${config.algorithms.join(', ')} with ${config.numDevices} devices, ${config.numSlots} slots, ` +
      `CW [${config.minCW}, ${config.maxCW}], ${config.numPreambles} preambles, seed ${config.seed}`
  );
  process.stdout.write(formatTextReport(runComparison(config)));
}

try {
  main();
} catch (err) {
  console.error('Failed to compare backoff algorithms', err);
  process.exit(1);
}
