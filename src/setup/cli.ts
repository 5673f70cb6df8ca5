import chalk from 'chalk';
import { runSetup } from './bootstrap';
import { nodeSystem, Reporter } from './system';

const consoleReporter: Reporter = {
  step: message => console.log(chalk.cyan(message)),
  info: message => console.log(message),
  success: message => console.log(chalk.green(`✅ ${message}`)),
  warn: message => console.log(chalk.yellow(`⚠️  ${message}`)),
  error: message => console.error(chalk.red(`❌ ${message}`)),
};

runSetup(nodeSystem, consoleReporter, process.cwd())
  .then(code => process.exit(code))
  .catch(error => {
    console.error(chalk.red(`❌ Setup failed: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
