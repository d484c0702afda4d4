export interface JwtPayload {
  sub: string;
  email: string;
}

/** What JwtStrategy puts on `req.user`. */
export interface AuthUser {
  id: string;
  email: string;
}

export interface PublicUser {
  id: string;
  email: string;
  displayName: string | null;
  lastLoginAt: Date | null;
  createdAt: Date;
}
