import bcrypt from 'bcrypt';
import jwt, { type JwtPayload } from 'jsonwebtoken';
import { join } from 'node:path';
import type { AppConfig } from '../config/env.js';
import { getJwtSecret } from '../config/security.js';
import logger from '../logger.js';
import { AppError } from '../middleware/errorHandler.js';
import { readTextFile, serializeJson, writeFileAtomic } from '../storage/jsonFile.js';
import type { LedgerSession, PublicUser, StoredUser, UserDirectory } from '../types.js';
import { emptyDocument, serializeDocument } from './ledgerDocument.js';

const JWT_EXPIRES_IN = '7d';
const USERNAME_PATTERN = /^[a-z0-9_.-]{1,64}$/;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+$/;
export const MIN_PASSWORD_LENGTH = 6;

const INVALID_CREDENTIALS = 'Invalid username or password';

export type AccountConfig = Pick<AppConfig, 'dataDir' | 'bcryptRounds'>;

export interface LoginResult {
  user: PublicUser;
  token: string;
}

export function normalizeUsername(username: string): string {
  return username.trim().toLowerCase();
}

export function usersFile(config: AccountConfig): string {
  return join(config.dataDir, 'users.json');
}

/** The username is part of the filename, so it must already be validated. */
export function ledgerFileFor(config: AccountConfig, username: string | null): string {
  return join(config.dataDir, username === null ? 'budget_data.json' : `budget_data_${username}.json`);
}

export function sessionFor(config: AccountConfig, username: string | null): LedgerSession {
  return { username, dataFile: ledgerFileFor(config, username) };
}

function isStoredUser(value: unknown): value is StoredUser {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'passwordHash' in value &&
    typeof value.passwordHash === 'string' &&
    'createdAt' in value &&
    typeof value.createdAt === 'string' &&
    (!('email' in value) || value.email === null || typeof value.email === 'string')
  );
}

async function loadUsers(config: AccountConfig): Promise<UserDirectory> {
  const raw = await readTextFile(usersFile(config));
  if (raw === null) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.error({ err: error, file: usersFile(config) }, 'Users file is not valid JSON');
    throw new AppError(500, 'User store is unreadable', { code: 'USER_STORE_CORRUPT' });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new AppError(500, 'User store is unreadable', { code: 'USER_STORE_CORRUPT' });
  }

  const users: UserDirectory = {};
  for (const [username, entry] of Object.entries(parsed)) {
    if (username !== '__proto__' && isStoredUser(entry)) {
      users[username] = { passwordHash: entry.passwordHash, email: entry.email ?? null, createdAt: entry.createdAt };
    } else {
      logger.warn({ username }, 'Skipping malformed user entry');
    }
  }
  return users;
}

async function saveUsers(config: AccountConfig, users: UserDirectory): Promise<void> {
  try {
    await writeFileAtomic(usersFile(config), serializeJson(users));
  } catch (error) {
    logger.error({ err: error }, 'Failed to write users file');
    throw new AppError(500, 'Failed to save account', { code: 'USER_STORE_WRITE_FAILED' });
  }
}

let usersQueue: Promise<void> = Promise.resolve();

// users.json is shared by every account, so its read-modify-write cycles run one at a time
function withUsersLock<T>(task: () => Promise<T>): Promise<T> {
  const run = usersQueue.then(task);
  // The caller observes a failure through `run`; the queue only needs to know it settled
  usersQueue = run.then(
    () => undefined,
    () => undefined
  );
  return run;
}

function toPublicUser(username: string, user: StoredUser): PublicUser {
  return { username, email: user.email, createdAt: user.createdAt };
}

function issueToken(username: string): string {
  return jwt.sign({ username }, getJwtSecret(), { expiresIn: JWT_EXPIRES_IN });
}

let dummyHash: Promise<string> | undefined;

// Compared against when the username is unknown, so both failure paths cost one bcrypt round
function getDummyHash(rounds: number): Promise<string> {
  dummyHash ??= bcrypt.hash('placeholder-password', rounds);
  return dummyHash;
}

export async function signup(
  config: AccountConfig,
  rawUsername: string,
  password: string,
  rawEmail?: string | null
): Promise<LoginResult> {
  const username = normalizeUsername(rawUsername);
  if (!USERNAME_PATTERN.test(username) || username === '__proto__') {
    throw new AppError(400, 'Username may only contain letters, digits, ".", "_" and "-" (max 64)', {
      code: 'INVALID_USERNAME',
    });
  }
  if (password.length < MIN_PASSWORD_LENGTH) {
    throw new AppError(400, `Password must be at least ${MIN_PASSWORD_LENGTH} characters`, {
      code: 'PASSWORD_TOO_SHORT',
      params: { minLength: MIN_PASSWORD_LENGTH },
    });
  }

  const email = rawEmail?.trim() || null;
  if (email !== null && !EMAIL_PATTERN.test(email)) {
    throw new AppError(400, 'Invalid email address', { code: 'INVALID_EMAIL' });
  }

  const passwordHash = await bcrypt.hash(password, config.bcryptRounds);

  const user = await withUsersLock(async () => {
    const users = await loadUsers(config);
    if (Object.hasOwn(users, username)) {
      throw new AppError(409, 'Username already exists', { code: 'USERNAME_TAKEN' });
    }

    const created: StoredUser = { passwordHash, email, createdAt: new Date().toISOString() };
    users[username] = created;
    await saveUsers(config, users);
    return created;
  });

  const dataFile = ledgerFileFor(config, username);
  if ((await readTextFile(dataFile)) === null) {
    await writeFileAtomic(dataFile, serializeDocument(emptyDocument()));
  }

  logger.info({ username }, 'Account created');
  return { user: toPublicUser(username, user), token: issueToken(username) };
}

export async function login(config: AccountConfig, rawUsername: string, password: string): Promise<LoginResult> {
  const username = normalizeUsername(rawUsername);
  const users = await loadUsers(config);
  const user = Object.hasOwn(users, username) ? users[username] : undefined;

  if (!user) {
    await bcrypt.compare(password, await getDummyHash(config.bcryptRounds));
    throw new AppError(401, INVALID_CREDENTIALS, { code: 'INVALID_CREDENTIALS' });
  }

  const validPassword = await bcrypt.compare(password, user.passwordHash);
  if (!validPassword) {
    throw new AppError(401, INVALID_CREDENTIALS, { code: 'INVALID_CREDENTIALS' });
  }

  return { user: toPublicUser(username, user), token: issueToken(username) };
}

export function verifyToken(token: string): { username: string } {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, getJwtSecret());
  } catch {
    throw new AppError(401, 'Invalid or expired token', { code: 'INVALID_TOKEN' });
  }

  if (typeof decoded === 'string' || typeof decoded.username !== 'string') {
    throw new AppError(401, 'Invalid or expired token', { code: 'INVALID_TOKEN' });
  }
  return { username: decoded.username };
}

export async function getUser(config: AccountConfig, username: string): Promise<PublicUser | null> {
  const users = await loadUsers(config);
  if (!Object.hasOwn(users, username)) {
    return null;
  }
  return toPublicUser(username, users[username]);
}

export async function changePassword(
  config: AccountConfig,
  username: string,
  currentPassword: string,
  newPassword: string
): Promise<void> {
  if (newPassword.length < MIN_PASSWORD_LENGTH) {
    throw new AppError(400, `New password must be at least ${MIN_PASSWORD_LENGTH} characters`, {
      code: 'PASSWORD_TOO_SHORT',
      params: { minLength: MIN_PASSWORD_LENGTH },
    });
  }

  const passwordHash = await bcrypt.hash(newPassword, config.bcryptRounds);

  await withUsersLock(async () => {
    const users = await loadUsers(config);
    const user = Object.hasOwn(users, username) ? users[username] : undefined;
    if (!user) {
      throw new AppError(404, 'User not found');
    }

    const validPassword = await bcrypt.compare(currentPassword, user.passwordHash);
    if (!validPassword) {
      throw new AppError(400, 'Invalid current password', { code: 'INVALID_CURRENT_PASSWORD' });
    }

    users[username] = { ...user, passwordHash };
    await saveUsers(config, users);
  });
  logger.info({ username }, 'Password changed');
}
