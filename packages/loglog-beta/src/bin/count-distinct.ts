import {createInterface} from 'node:readline';
import {hideBin} from 'yargs/helpers';
import {createLogContext} from '../../../shared/src/logging.ts';
import {parseCountDistinctConfig} from '../config.ts';
import {countDistinct} from '../count-distinct.ts';

async function main() {
  const config = parseCountDistinctConfig(hideBin(process.argv), {
    exitProcess: true,
  });
  const lc = createLogContext(config, {worker: 'count-distinct'});
  const lines = createInterface({input: process.stdin, crlfDelay: Infinity});
  const result = await countDistinct(lc, config, lines);
  process.stdout.write(JSON.stringify(result, undefined, 2) + '\n');
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
