import type { DriveProtocol } from '../../src/types/drive'
import { UnsupportedProtocolError } from '../errors'
import { CloudConnector } from './CloudConnector'
import { FTPConnector } from './FTPConnector'
import { SFTPConnector } from './SFTPConnector'
import { SMBConnector } from './SMBConnector'
import type { ConnectorSession, ProtocolConnector } from './types'
import { WebDAVConnector } from './WebDAVConnector'

export type ConnectorFactory = (protocol: DriveProtocol) => ProtocolConnector<ConnectorSession>

/** Built-in connector for a protocol; a new instance per call */
export function createConnector(protocol: string): ProtocolConnector<ConnectorSession> {
  switch (protocol) {
    case 'sftp':
      return new SFTPConnector()
    case 'ftp':
      return new FTPConnector()
    case 'webdav':
      return new WebDAVConnector()
    case 'cloud':
      return new CloudConnector()
    case 'smb':
      return new SMBConnector()
    default:
      throw new UnsupportedProtocolError(protocol)
  }
}

export { CloudConnector, FTPConnector, SFTPConnector, SMBConnector, WebDAVConnector }
export type * from './types'
