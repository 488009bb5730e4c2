import type { User } from '../domain/index.js';
import type { UserRepository } from '../repositories/index.js';
import { ConflictError } from '../utils/errors.js';
import { hashPassword } from '../utils/password.js';

export interface CreateUserInput {
  firstName: string;
  lastName: string;
  email: string;
  password: string;
  shippingAddress?: string | null;
}

export interface UserServiceDeps {
  userRepository: UserRepository;
}

export function createUserService({ userRepository }: UserServiceDeps) {
  return {
    /**
     * Register a customer with an empty cart.
     * The password is stored only as a bcrypt hash.
     * Throws ConflictError if the email is already registered.
     */
    async createUser(input: CreateUserInput): Promise<User> {
      const existing = await userRepository.findByEmail(input.email);
      if (existing) {
        throw new ConflictError('An user with this email already exists');
      }

      const user: User = {
        id: crypto.randomUUID(),
        email: input.email,
        firstName: input.firstName,
        lastName: input.lastName,
        hashedPassword: await hashPassword(input.password),
        shippingAddress: input.shippingAddress ?? null,
        cartItems: [],
      };

      return userRepository.save(user);
    },
  };
}

export type UserService = ReturnType<typeof createUserService>;
