import { sanitizeString } from "../security/html";
import type { PasswordHasher } from "../security/password";
import { AuthenticationError, DatabaseError, ValidationError } from "./errors";
import { isValidPassword, loginSchema, parseWithSchema, passwordChangeSchema, registrationSchema } from "./validation";
import type { UserRecord, UserRepository } from "./user-repository";

export const REGISTRATION_FAILED_MESSAGE = "Registration failed. Please check your input.";
export const AUTHENTICATION_FAILED_MESSAGE = "Authentication failed. Please check your credentials.";

const NAME_MAX_LENGTH = 50;

export interface AuthServiceDependencies {
  users: UserRepository;
  passwordHasher: PasswordHasher;
  now?: () => Date;
}

export class AuthService {
  private readonly users: UserRepository;
  private readonly passwordHasher: PasswordHasher;
  private readonly now: () => Date;

  constructor(dependencies: AuthServiceDependencies) {
    this.users = dependencies.users;
    this.passwordHasher = dependencies.passwordHasher;
    this.now = dependencies.now ?? (() => new Date());
  }

  /**
   * @throws SecurityException when the payload fails schema validation.
   * @throws ValidationError when the email or username is already taken.
   */
  async registerUser(body: unknown): Promise<UserRecord> {
    const input = parseWithSchema(registrationSchema, body);

    if (await this.users.emailExists(input.email)) {
      throw new ValidationError("Email address already exists", { userMessage: REGISTRATION_FAILED_MESSAGE });
    }
    if (await this.users.usernameExists(input.username)) {
      throw new ValidationError("Username already exists", { userMessage: REGISTRATION_FAILED_MESSAGE });
    }

    const passwordHash = await this.passwordHasher.hash(input.password);

    try {
      return await this.users.createUser({
        email: input.email,
        username: input.username,
        passwordHash,
        firstName: sanitizeString(input.first_name, NAME_MAX_LENGTH),
        lastName: sanitizeString(input.last_name, NAME_MAX_LENGTH)
      });
    } catch (error) {
      // Lost a race with a concurrent registration of the same email or username.
      if (error instanceof DatabaseError) {
        throw new ValidationError(error.message, { details: error.details, userMessage: REGISTRATION_FAILED_MESSAGE });
      }
      throw error;
    }
  }

  /**
   * @throws SecurityException when the payload fails schema validation.
   * @throws AuthenticationError for unknown, inactive or mismatched credentials.
   */
  async authenticateUser(body: unknown): Promise<UserRecord> {
    const input = parseWithSchema(loginSchema, body);
    const user = await this.users.findByEmail(input.email);

    if (!user) {
      throw new AuthenticationError("Invalid email or password", { userMessage: AUTHENTICATION_FAILED_MESSAGE });
    }
    if (!user.isActive) {
      throw new AuthenticationError("Account is deactivated", { userMessage: AUTHENTICATION_FAILED_MESSAGE });
    }
    if (!(await this.passwordHasher.verify(input.password, user.passwordHash))) {
      throw new AuthenticationError("Invalid email or password", { userMessage: AUTHENTICATION_FAILED_MESSAGE });
    }

    const lastLogin = this.now().toISOString();
    await this.users.recordLogin(user.id, lastLogin);

    return { ...user, lastLogin };
  }

  /**
   * @throws AuthenticationError when the user is missing or the current password is wrong.
   * @throws ValidationError when the new password is too weak.
   */
  async changePassword(userId: number, body: unknown): Promise<void> {
    const input = parseWithSchema(passwordChangeSchema, body);
    const user = await this.users.findById(userId);

    if (!user) {
      throw new AuthenticationError("User not found");
    }
    if (!(await this.passwordHasher.verify(input.current_password, user.passwordHash))) {
      throw new AuthenticationError("Current password is incorrect");
    }
    if (!isValidPassword(input.new_password)) {
      throw new ValidationError("New password doesn't meet requirements");
    }

    await this.users.updatePasswordHash(userId, await this.passwordHasher.hash(input.new_password));
  }
}
