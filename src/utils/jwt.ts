import jwt from 'jsonwebtoken';

export interface TokenPayload {
  sub: string; // user ID
  iat?: number;
}

const ISSUER = 'waste-report-api';

export interface TokenService {
  generateAccessToken(userId: string, expiresInSeconds?: number): string;
  verifyAccessToken(token: string): TokenPayload | null;
}

export const createTokenService = (secret: string): TokenService => ({
  generateAccessToken: (userId, expiresInSeconds = 60 * 60) =>
    jwt.sign({ sub: userId }, secret, {
      expiresIn: expiresInSeconds,
      issuer: ISSUER,
      algorithm: 'HS256',
    }),

  verifyAccessToken: (token) => {
    try {
      const decoded = jwt.verify(token, secret, {
        algorithms: ['HS256'],
        issuer: ISSUER,
      });
      if (typeof decoded === 'string' || typeof decoded.sub !== 'string') {
        return null;
      }
      return { sub: decoded.sub, iat: decoded.iat };
    } catch {
      return null;
    }
  },
});
