/**
 * Library entry point: the session, relay and endpoint building blocks used
 * by the cipherlink-server and cipherlink-client commands.
 */

export * from './shared/errors.js';
export * from './shared/crypto/index.js';
export * from './shared/protocol/index.js';
export {
  getConfigDir,
  getConfigPath,
  getEnvFilePath,
  getKeysDir,
  getDefaultKeyFile,
  applyEnvOverrides,
  parseConfig,
  resolveSessionConfig,
  loadConfig,
  saveConfig,
  configSchema,
  sessionConfigSchema,
  serverConfigSchema,
  clientConfigSchema,
  type CipherlinkConfig,
  type SessionConfig,
  type ServerConfig,
  type ClientConfig,
} from './shared/config.js';
export { createLogger, setLogLevel, LEVELS, type Logger, type LevelName } from './shared/logger.js';
export {
  createLifecycleLog,
  noopSink,
  type LifecycleEvent,
  type LifecycleSink,
  type SessionStats,
  type SessionOpenedEvent,
  type SessionClosedEvent,
  type RekeyEvent,
  type RelayConnectEvent,
} from './shared/lifecycle.js';
export { connectTcp, type ConnectOptions } from './shared/net.js';
export * from './tunnel/index.js';
export * from './relay/index.js';
export { TunnelListener, type TunnelListenerOptions } from './server/listener.js';
export { TunnelDialer, type TunnelDialerOptions } from './client/dialer.js';
export { LocalSocksServer, type LocalSocksServerOptions } from './client/local-socks.js';
