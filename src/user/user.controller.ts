import {
  Body,
  Controller,
  Delete,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Post,
  Put,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ZodValidationPipe } from '../core/zod-validation.pipe';
import { extractBearerToken } from '../session/bearer';
import { SessionClaims, SessionService } from '../session/session.service';
import { TokenAuthGuard } from './auth.guard';
import { CurrentSession, CurrentUser } from './current-user.decorator';
import {
  LoginDto,
  loginSchema,
  ProfileView,
  RegisterDto,
  registerSchema,
  UpdateProfileDto,
  updateProfileSchema,
} from './user.dto';
import { User } from './user.entity';
import { UserService } from './user.service';

export interface LoginResponse {
  accessToken: string;
  tokenType: 'Bearer';
  expiresIn: number;
  expiresAt: Date;
}

@ApiTags('Auth')
@Controller()
export class UserController {
  constructor(
    private readonly userService: UserService,
    private readonly sessionService: SessionService,
  ) {}

  @Post('register')
  @ApiOperation({ summary: 'Register', description: 'Create an identity from a username, email and password.' })
  @ApiResponse({ status: 201, description: 'Identity created' })
  @ApiResponse({ status: 409, description: 'Username or email already registered' })
  async register(@Body(new ZodValidationPipe(registerSchema)) dto: RegisterDto): Promise<ProfileView> {
    const user = await this.userService.register(dto);
    return this.userService.toProfile(user);
  }

  @Post('login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Login', description: 'Exchange a username or email and password for a bearer token.' })
  @ApiResponse({ status: 401, description: 'Invalid credentials' })
  async login(@Body(new ZodValidationPipe(loginSchema)) dto: LoginDto): Promise<LoginResponse> {
    const identityId = await this.userService.verify(dto.usernameOrEmail, dto.password);
    const issued = this.sessionService.issue(identityId);
    return {
      accessToken: issued.token,
      tokenType: 'Bearer',
      expiresIn: Math.round((issued.expiresAt.getTime() - issued.issuedAt.getTime()) / 1000),
      expiresAt: issued.expiresAt,
    };
  }

  @Post('logout')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Logout', description: 'Revoke the presented bearer token. Always succeeds.' })
  async logout(@Headers('authorization') authHeader?: string): Promise<void> {
    const token = extractBearerToken(authHeader);
    if (token) {
      await this.sessionService.invalidate(token);
    }
  }

  @Get('profile')
  @UseGuards(TokenAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Get profile' })
  getProfile(@CurrentUser() user: User): ProfileView {
    return this.userService.toProfile(user);
  }

  @Put('profile')
  @UseGuards(TokenAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Update profile', description: 'Change username, email or password.' })
  @ApiResponse({ status: 403, description: 'Current password is incorrect' })
  @ApiResponse({ status: 409, description: 'Username or email already registered' })
  async updateProfile(
    @CurrentUser() user: User,
    @Body(new ZodValidationPipe(updateProfileSchema)) dto: UpdateProfileDto,
  ): Promise<ProfileView> {
    const updated = await this.userService.updateProfile(user, dto);
    return this.userService.toProfile(updated);
  }

  @Delete('profile')
  @HttpCode(HttpStatus.NO_CONTENT)
  @UseGuards(TokenAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Deactivate account', description: 'Soft-delete the identity and revoke the presented token.' })
  async deactivate(
    @CurrentUser() user: User,
    @CurrentSession() session: SessionClaims & { token: string },
  ): Promise<void> {
    await this.userService.deactivate(user.id);
    await this.sessionService.invalidate(session.token);
  }
}
