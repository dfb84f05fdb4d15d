import { OAuth2Client } from 'google-auth-library'
import { AppError, ErrorCodes, errorMessage } from '../utils/errors.js'

export type InternalTokenVerifier = (idToken: string) => Promise<void>

export type OidcVerifierOptions = {
  audience: string
  // Only tokens minted for this identity are accepted when set.
  serviceAccountEmail?: string
}

// The part of OAuth2Client used here.
export type IdTokenClient = {
  verifyIdToken(options: { idToken: string; audience: string }): Promise<{
    getPayload(): { email?: string; email_verified?: boolean } | undefined
  }>
}

// Cloud Tasks attaches a Google-signed OIDC token for the configured audience.
export const createOidcVerifier = (
  options: OidcVerifierOptions,
  client: IdTokenClient = new OAuth2Client()
): InternalTokenVerifier =>
  async (idToken) => {
    try {
      const ticket = await client.verifyIdToken({ idToken, audience: options.audience })
      const payload = ticket.getPayload()
      if (!payload?.email_verified) {
        throw new Error('token email is not verified')
      }
      if (options.serviceAccountEmail && payload.email !== options.serviceAccountEmail) {
        throw new Error('token was not issued to the task service account')
      }
    } catch (error) {
      throw new AppError(ErrorCodes.UNAUTHORIZED, 'invalid internal token', 401, {
        reason: errorMessage(error)
      })
    }
  }
