import { ForbiddenException, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Env } from '../core/env.validation';
import {
  DuplicateIdentityError,
  InvalidCredentialsError,
  isUniqueViolation,
} from '../core/errors';
import { hashPassword, verifyPassword } from './password';
import { ProfileView, RegisterInput, UpdateProfileInput } from './user.dto';
import { User } from './user.entity';

@Injectable()
export class UserService implements OnModuleInit {
  private readonly logger = new Logger(UserService.name);
  private readonly rounds: number;
  // compared against when no identity matches, so every failed login costs one bcrypt compare
  private dummyDigest!: string;

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    configService: ConfigService<Env, true>,
  ) {
    this.rounds = configService.get('BCRYPT_ROUNDS', { infer: true });
  }

  async onModuleInit(): Promise<void> {
    this.dummyDigest = await hashPassword('not-a-real-password', this.rounds);
  }

  /**
   * Creates a new identity. Uniqueness of username and email is left to the
   * table's unique constraints, so two concurrent registrations cannot both
   * succeed.
   */
  async register(input: RegisterInput): Promise<User> {
    const user = this.userRepository.create({
      username: input.username,
      email: input.email,
      passwordHash: await hashPassword(input.password, this.rounds),
    });

    try {
      await this.userRepository.insert(user);
    } catch (error) {
      if (isUniqueViolation(error)) throw new DuplicateIdentityError();
      throw error;
    }

    this.logger.log(`Registered identity ${user.id} (${user.username})`);
    return this.userRepository.findOneByOrFail({ id: user.id });
  }

  // Returns the identity id for a matching username/email and password.
  async verify(usernameOrEmail: string, password: string): Promise<number> {
    const key = usernameOrEmail.trim();
    const where = key.includes('@') ? { email: key.toLowerCase() } : { username: key };
    const found = await this.userRepository.findOne({
      where,
      select: { id: true, passwordHash: true },
    });

    if (!found) {
      await verifyPassword(password, this.dummyDigest);
      throw new InvalidCredentialsError();
    }
    if (!(await verifyPassword(password, found.passwordHash))) {
      throw new InvalidCredentialsError();
    }
    return found.id;
  }

  async findById(id: number): Promise<User | null> {
    return this.userRepository.findOne({ where: { id } });
  }

  async updateProfile(user: User, changes: UpdateProfileInput): Promise<User> {
    const patch: Partial<User> = {};
    if (changes.username !== undefined) patch.username = changes.username;
    if (changes.email !== undefined) patch.email = changes.email;

    if (changes.password !== undefined) {
      const current = await this.userRepository.findOne({
        where: { id: user.id },
        select: { id: true, passwordHash: true },
      });
      const currentPassword = changes.currentPassword ?? '';
      if (!current || !(await verifyPassword(currentPassword, current.passwordHash))) {
        throw new ForbiddenException('Current password is incorrect');
      }
      patch.passwordHash = await hashPassword(changes.password, this.rounds);
    }

    try {
      await this.userRepository.update({ id: user.id }, patch);
    } catch (error) {
      if (isUniqueViolation(error)) throw new DuplicateIdentityError();
      throw error;
    }

    return this.userRepository.findOneByOrFail({ id: user.id });
  }

  // Identities are never removed; the row stays so its username and email remain taken.
  async deactivate(id: number): Promise<void> {
    await this.userRepository.softDelete({ id });
    this.logger.log(`Deactivated identity ${id}`);
  }

  toProfile(user: User): ProfileView {
    return {
      id: user.id,
      username: user.username,
      email: user.email,
      createdAt: user.createdAt,
      updatedAt: user.updatedAt,
    };
  }
}
