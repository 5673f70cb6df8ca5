import { SUPERUSER_MARKER } from '../setup/bootstrap';
import { runScript } from './context';

void runScript('superuserStatus', async ({ container }) => {
  const exists = await container.repositories.users.superuserExists();
  console.log(exists ? SUPERUSER_MARKER : 'No superuser');
});
