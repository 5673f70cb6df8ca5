import { join } from 'path';
import { Reporter, SystemOps } from './system';

export const SUPERUSER_MARKER = 'Superuser exists';

interface ProbeSpec {
  label: string;
  client: string;
  args: string[];
  missingHint: string;
  failureHint: string;
  remedy: string;
}

/** Warns on a missing client or a failed probe; never stops the setup. */
async function probeService(spec: ProbeSpec, system: SystemOps, reporter: Reporter): Promise<boolean> {
  if (!(await system.commandExists(spec.client))) {
    reporter.warn(spec.missingHint);
    reporter.info(`   You can use: ${spec.remedy}`);
    return false;
  }
  const result = await system.run(spec.client, spec.args);
  if (result.code !== 0) {
    reporter.warn(spec.failureHint);
    reporter.info(`   You can use: ${spec.remedy}`);
    return false;
  }
  reporter.success(`${spec.label} connection successful`);
  return true;
}

/**
 * Prepares a local checkout: dependencies, .env, service probes, schema and
 * an admin account. Resolves to the process exit code.
 */
export async function runSetup(system: SystemOps, reporter: Reporter, root: string): Promise<number> {
  reporter.step('Starting SocialConnect project setup...');

  for (const tool of ['node', 'npm']) {
    if (!(await system.commandExists(tool))) {
      reporter.error(`${tool} is not installed. Please install Node.js 20 first.`);
      return 1;
    }
  }

  const modulesDir = join(root, 'node_modules');
  if (!system.exists(modulesDir)) {
    reporter.step('Creating dependency environment...');
    system.mkdir(modulesDir);
  }

  reporter.step('Installing dependencies...');
  const install = await system.run('npm', ['install'], { interactive: true });
  if (install.code !== 0) {
    reporter.warn(`npm install exited with code ${install.code}`);
  }

  const envPath = join(root, '.env');
  if (!system.exists(envPath)) {
    reporter.step('Creating environment file...');
    system.copyFile(join(root, 'env.example'), envPath);
    reporter.warn('Please edit .env file with your configuration before proceeding.');
    await system.waitForEnter("   Press Enter when you're ready to continue...");
  }

  const env = system.readEnvFile(envPath);
  const dbHost = env.DB_HOST || 'localhost';
  const dbUser = env.DB_USER || 'postgres';
  const dbName = env.DB_NAME || 'socialconnect';

  reporter.step('Checking database connection...');
  await probeService({
    label: 'Database',
    client: 'psql',
    args: ['-h', dbHost, '-U', dbUser, '-d', dbName, '-c', 'SELECT 1;'],
    missingHint: 'PostgreSQL client not found. Please install PostgreSQL or use Docker.',
    failureHint: 'Cannot connect to database. Please ensure PostgreSQL is running.',
    remedy: 'docker-compose up -d db',
  }, system, reporter);

  reporter.step('Checking Redis connection...');
  await probeService({
    label: 'Redis',
    client: 'redis-cli',
    args: ['ping'],
    missingHint: 'Redis client not found. Please install Redis or use Docker.',
    failureHint: 'Cannot connect to Redis. Please ensure Redis is running.',
    remedy: 'docker-compose up -d redis',
  }, system, reporter);

  reporter.step('Running database migrations...');
  const migrate = await system.run('npm', ['run', 'migrate'], { interactive: true });
  if (migrate.code !== 0) {
    reporter.warn(`Migrations exited with code ${migrate.code}`);
  }

  reporter.step('Checking for superuser...');
  const status = await system.run('npm', ['run', '--silent', 'superuser:status']);
  if (status.code === 0 && status.output.includes(SUPERUSER_MARKER)) {
    reporter.success('Superuser already exists');
  } else {
    reporter.step('Creating superuser...');
    await system.run('npm', ['run', 'createsuperuser'], { interactive: true });
  }

  reporter.success('Setup complete!');
  reporter.info('');
  reporter.info('Next steps:');
  reporter.info('1. Start the development server: npm run dev');
  reporter.info('2. Check the API: http://localhost:8000/health');
  reporter.info('3. Explore the endpoints under http://localhost:8000/api/');
  reporter.info('4. Create sample users: npm run seed');
  reporter.info('');
  reporter.info('Alternative: Use Docker for easy setup:');
  reporter.info('  docker-compose up -d');
  return 0;
}
