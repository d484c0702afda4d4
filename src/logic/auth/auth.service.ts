import { Injectable, UnauthorizedException, ConflictException, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcryptjs';
import { User } from '../../entities';
import { LoginDto, SignupDto } from './dto/auth.dto';
import { JwtPayload, PublicUser } from './types';

const PASSWORD_ROUNDS = 12;

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    private readonly jwtService: JwtService,
  ) {}

  async validateUser(email: string, password: string): Promise<User | null> {
    const user = await this.userRepository.findOne({
      where: { email: email.toLowerCase() },
    });

    if (user && await bcrypt.compare(password, user.password)) {
      return user;
    }
    return null;
  }

  async login(loginDto: LoginDto) {
    const user = await this.validateUser(loginDto.email, loginDto.password);
    if (!user) {
      throw new UnauthorizedException('Invalid credentials');
    }

    const lastLoginAt = new Date();
    await this.userRepository.update(user.id, { lastLoginAt });

    const payload: JwtPayload = { sub: user.id, email: user.email };
    this.logger.log(`User ${user.id} logged in`);

    return {
      access_token: this.jwtService.sign(payload),
      user: this.toPublic({ ...user, lastLoginAt }),
    };
  }

  async signup(signupDto: SignupDto) {
    const email = signupDto.email.toLowerCase();
    const existingUser = await this.userRepository.findOne({
      where: { email },
    });

    if (existingUser) {
      throw new ConflictException('User with this email already exists');
    }

    const hashedPassword = await bcrypt.hash(signupDto.password, PASSWORD_ROUNDS);

    const user = await this.userRepository.save({
      email,
      password: hashedPassword,
      displayName: signupDto.displayName ?? null,
      lastLoginAt: null,
    });

    return { user: this.toPublic(user) };
  }

  async getProfile(userId: string): Promise<PublicUser> {
    const user = await this.userRepository.findOne({
      where: { id: userId },
    });

    if (!user) {
      throw new UnauthorizedException('User not found');
    }

    return this.toPublic(user);
  }

  private toPublic(user: Pick<User, 'id' | 'email' | 'displayName' | 'lastLoginAt' | 'createdAt'>): PublicUser {
    return {
      id: user.id,
      email: user.email,
      displayName: user.displayName,
      lastLoginAt: user.lastLoginAt,
      createdAt: user.createdAt,
    };
  }
}
