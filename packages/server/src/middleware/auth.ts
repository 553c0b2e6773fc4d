import type { FastifyRequest, FastifyReply } from 'fastify';
import type { ApiResponse, JWTPayload } from '../types/index.js';

// JWT verification middleware
export async function authenticateRequest(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  try {
    const decoded = await request.jwtVerify<JWTPayload>();
    if (typeof decoded.organization !== 'string' || decoded.organization.length === 0) {
      throw new Error('Token carries no organization');
    }
    request.user = decoded;
  } catch {
    reply.code(401).send({
      success: false,
      error: 'Unauthorized',
      message: 'Invalid or expired token',
    } satisfies ApiResponse);
  }
}

// Helper to get the caller's organization (assumes auth middleware has run)
export function getOrganization(request: FastifyRequest): string {
  return request.user.organization;
}
