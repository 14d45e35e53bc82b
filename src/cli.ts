import { dirname } from 'path';
import { loadMetadataConfig } from './config';
import { convertFiles } from './detector';
import { ConsoleNotifier } from './notifier';

const [destination, ...files] = process.argv.slice(2);

if (destination === undefined || files.length === 0) {
  console.error('Usage: nki2sfz <destination-folder> <file.nki>...');
  process.exit(2);
}

const written = await convertFiles(files, destination, {
  config: loadMetadataConfig(),
  notifier: new ConsoleNotifier(),
  sourceFolder: dirname(files[0]),
});
process.exitCode = written > 0 ? 0 : 1;
