import { run } from './index.js';
import { consoleIO } from './lib/io.js';

process.exitCode = await run(process.argv.slice(2), { io: consoleIO() });
