import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { USER_ROLES } from '../models/user.model';
import { errorMessage } from '../utils/logger';
import { runScript } from './context';

const sampleUsersSchema = z.array(
  z.object({
    username: z.string(),
    email: z.string().email(),
    password: z.string(),
    firstName: z.string(),
    lastName: z.string(),
    bio: z.string().default(''),
    role: z.enum(USER_ROLES).default('user'),
  })
);

export const loadSampleUsers = (path: string = join(__dirname, 'data', 'sample-users.json')) =>
  sampleUsersSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));

if (require.main === module) {
  void runScript('seed', async ({ container }) => {
    console.log('Creating sample data...');
    let created = 0;
    for (const sample of loadSampleUsers()) {
      if (await container.repositories.users.findUserByUsername(sample.username)) {
        console.log(`User ${sample.username} already exists`);
        continue;
      }
      try {
        await container.services.auth.register({ ...sample, passwordConfirm: sample.password, isEmailVerified: true });
        created += 1;
        console.log(`Created user: ${sample.username}`);
      } catch (error) {
        console.error(`Error creating user ${sample.username}: ${errorMessage(error)}`);
      }
    }
    console.log(`Created ${created} sample users`);
  });
}
