import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../../config';

export const JOB_SCOPE = 'jobs';

const jobTokenPayloadSchema = z.object({
  sub: z.string().min(1),
  scope: z.literal(JOB_SCOPE),
});

export type JobTokenPayload = z.infer<typeof jobTokenPayloadSchema>;

const JWT_EXPIRY_SECONDS = 30 * 24 * 60 * 60; // 30 days

/**
 * Bearer tokens for the job trigger endpoints
 */
export class AuthService {
  constructor(private readonly secret: string = config.jwtSecret) {}

  signToken(subject: string, expiresInSeconds: number = JWT_EXPIRY_SECONDS): string {
    const payload: JobTokenPayload = { sub: subject, scope: JOB_SCOPE };
    return jwt.sign(payload, this.secret, { expiresIn: expiresInSeconds });
  }

  verifyToken(token: string): JobTokenPayload {
    const decoded = jwt.verify(token, this.secret);
    const result = jobTokenPayloadSchema.safeParse(decoded);
    if (!result.success) {
      throw new Error('Token is not a job token');
    }
    return result.data;
  }
}

export const authService = new AuthService();
