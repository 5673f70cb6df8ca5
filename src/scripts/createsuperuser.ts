import { createInterface } from 'readline';
import { ValidationError } from '../utils/errors';
import { runScript } from './context';

const ask = (question: string): Promise<string> =>
  new Promise(resolve => {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    rl.question(question, answer => {
      rl.close();
      resolve(answer.trim());
    });
  });

void runScript('createsuperuser', async ({ container }) => {
  if (await container.repositories.users.superuserExists()) {
    console.log('Superuser already exists.');
    return;
  }

  console.log('Creating superuser...');
  const username = await ask('Enter username: ');
  const email = await ask('Enter email: ');
  const password = await ask('Enter password: ');

  try {
    await container.services.auth.register({
      username,
      email,
      password,
      passwordConfirm: password,
      firstName: 'Admin',
      lastName: 'User',
      role: 'admin',
      isSuperuser: true,
      isEmailVerified: true,
    });
    console.log(`Superuser '${username}' created successfully!`);
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    Object.entries(error.errors).forEach(([field, messages]) => console.error(`${field}: ${messages.join(' ')}`));
    process.exitCode = 1;
  }
});
