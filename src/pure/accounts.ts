/**
 * ACCOUNTS - registration, login and sessions
 *
 * Password hashing and session storage are effects; this module only
 * decides what to check and in which order.
 */

import {User} from '../domain';
import {SessionRecord} from '../types';
import {AppEffects} from './effects';
import {LoginResult} from './types';
import {toNewUser, toSessionRecord} from './businessLogic';
import {duplicateAccount, invalidCredentials, OrderingError} from './errors';
import {parseLoginForm, parseRegisterForm} from './validation';
import {Either, Left, Right} from 'purify-ts';

/**
 * Register a new user from the untrusted registration form.
 * Mobile number and e-mail address must both be unused.
 */
export function register(
  form: unknown
): (effects: Pick<AppEffects, 'users' | 'passwords'>) => Promise<Either<OrderingError, User>> {
  return async (effects) => {
    const request = parseRegisterForm(form);

    return request.caseOf<Promise<Either<OrderingError, User>>>({
      Left: (error) => Promise.resolve(Left(error)),
      Right: async (details): Promise<Either<OrderingError, User>> => {
        if (await effects.users.getByMobile(details.mobile)) {
          return Left(duplicateAccount('mobile'));
        }
        if (await effects.users.getByEmail(details.email)) {
          return Left(duplicateAccount('email'));
        }

        const passwordHash = await effects.passwords.hash(details.password);
        return Right(await effects.users.create(toNewUser(details, passwordHash)));
      }
    });
  };
}

/**
 * Check the credentials and open a session. Unknown mobile numbers and
 * wrong passwords are reported the same way.
 */
export function login(
  form: unknown
): (effects: Pick<AppEffects, 'users' | 'passwords' | 'sessions'>) => Promise<Either<OrderingError, LoginResult>> {
  return async (effects) => {
    const request = parseLoginForm(form);

    return request.caseOf<Promise<Either<OrderingError, LoginResult>>>({
      Left: (error) => Promise.resolve(Left(error)),
      Right: async (credentials): Promise<Either<OrderingError, LoginResult>> => {
        const user = await effects.users.getByMobile(credentials.mobile);
        if (!user || !(await effects.passwords.verify(credentials.password, user.passwordHash))) {
          return Left(invalidCredentials());
        }

        const sessionId = await effects.sessions.create(toSessionRecord(user));
        return Right({sessionId, user});
      }
    });
  };
}

export function logout(
  sessionId: string
): (effects: Pick<AppEffects, 'sessions'>) => Promise<void> {
  return (effects) => effects.sessions.destroy(sessionId);
}

export function resolveSession(
  sessionId: string
): (effects: Pick<AppEffects, 'sessions'>) => Promise<SessionRecord | null> {
  return (effects) => effects.sessions.get(sessionId);
}
