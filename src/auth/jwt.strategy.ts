import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { Actor, JwtPayload } from './actor';
import { UsersService } from '../users/users.service';

/**
 * Verifies tokens issued by the auth service and resolves them to an Actor.
 * The role always comes from the users table, never from the token claims.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  private readonly logger = new Logger(JwtStrategy.name);

  constructor(
    config: ConfigService,
    private readonly usersService: UsersService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: config.getOrThrow<string>('JWT_SECRET'),
      issuer: config.get<string>('JWT_ISS'),
      algorithms: ['HS256'],
    });
  }

  async validate(payload: JwtPayload): Promise<Actor> {
    const userId = Number(payload.sub);
    if (!Number.isInteger(userId)) {
      throw new UnauthorizedException('Invalid token subject');
    }

    const user = await this.usersService.findById(userId);
    if (!user) {
      throw new UnauthorizedException('Unknown user');
    }
    if (!user.isActive) {
      this.logger.warn(`Rejected token of deactivated user ${user.id}`);
      throw new UnauthorizedException('Account is deactivated');
    }

    await this.usersService.touchLastLogin(user, payload.iat);
    return { id: user.id, role: user.role };
  }
}
