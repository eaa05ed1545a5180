import { AuthType, type WebDAVClientOptions } from 'webdav'
import { AuthenticationError } from '../errors'
import type { ConnectParams } from './types'
import { WebDAVConnector } from './WebDAVConnector'

/**
 * Cloud storage reached through its WebDAV endpoint with a bearer token.
 * Falls back to basic auth when only a username/password is configured.
 */
export class CloudConnector extends WebDAVConnector {
  override readonly protocol = 'cloud' as const

  protected override clientOptions(params: ConnectParams): WebDAVClientOptions {
    if (params.token) {
      return {
        authType: AuthType.Token,
        token: { access_token: params.token, token_type: 'Bearer' }
      }
    }
    if (params.username) return super.clientOptions(params)
    throw new AuthenticationError('Cloud drives need an access token or a username')
  }
}
