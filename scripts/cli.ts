import 'dotenv/config';
import { runCli } from '../lib/cli';

process.exitCode = runCli(process.argv.slice(2));
