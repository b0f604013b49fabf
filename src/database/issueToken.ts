import { loadConfig } from '../config/env';
import { configureAuth, generateToken, type UserRole } from '../utils/auth';

const ROLES: UserRole[] = ['user', 'admin'];

const isRole = (value: string): value is UserRole => ROLES.some((role) => role === value);

const run = () => {
  const [rawId, rawRole = 'user'] = process.argv.slice(2);
  const id = Number(rawId);

  if (!Number.isSafeInteger(id) || id <= 0 || !isRole(rawRole)) {
    console.error('Usage: tsx src/database/issueToken.ts <userId> [user|admin]');
    process.exit(1);
  }

  const config = loadConfig();
  configureAuth({ secret: config.jwtSecret, expiresIn: config.jwtExpiresIn });
  console.log(generateToken({ id, role: rawRole }));
};

run();
