/**
 * Public API for kubegrid-shared.
 */

// Errors
export {
  PaneNotFoundError,
  InvariantViolationError,
  SubscriptionFailedError,
  ClusterUnavailableError,
  errorMessage,
} from './errors';

// Paths
export {
  getConfigDir,
  getConfigPath,
  getLogPath,
  getLogExportPath,
  getQueryExportPath,
  getQueryHistoryPath,
  getSavedQueriesPath,
} from './paths';

// Logging
export type { Logger, LogEntry, LogLevelLabel, CreateLoggerOptions } from './logging/logger';
export { LogRing, createLogger, appLogRing, logger, getLogger } from './logging/logger';

// Configuration
export type {
  KeybindingGroup,
  GeneralConfig,
  KeybindingsConfig,
  ThemeConfig,
  AppConfig,
  UserConfig,
} from './config/schema';
export { KEYBINDING_GROUPS, AppConfigSchema, UserConfigSchema } from './config/schema';
export type { KeyStringError, KeyCollision, LoadedConfig } from './config/loadConfig';
export {
  defaultConfig,
  mergeConfig,
  loadConfig,
  validateKeybindings,
  checkCollisions,
  initConfig,
} from './config/loadConfig';
export {
  keyEvent,
  normalizeKeyEvent,
  keyId,
  validateKeyString,
  parseKeyString,
  formatKeyDisplay,
  keyToInputString,
} from './config/keys';

// Pane tree, navigation, tabs
export type {
  PaneId,
  SplitOrientation,
  Direction,
  Rect,
  LeafNode,
  SplitNode,
  PaneNode,
  ReadonlyPaneNode,
} from './pane/types';
export { PaneTree, MIN_RATIO, MAX_RATIO, DEFAULT_RATIO, splitRect, clampRatio, firstLeaf } from './pane/PaneTree';
export { findPaneInDirection } from './pane/navigation';
export type { Tab } from './pane/TabManager';
export { TabManager } from './pane/TabManager';
export type { PluginName, ViewType } from './pane/viewType';
export { viewLabel, isInteractiveView } from './pane/viewType';

// Events
export type {
  KeyEvent,
  MouseInput,
  ToastLevel,
  QueryResult,
  QuerySchema,
  PortForwardInfo,
  AppEvent,
  PaneDelivery,
} from './events/types';
export { isPaneDelivery } from './events/types';
export { EventChannel } from './events/EventChannel';

// Cluster
export type { ResourceKind, ResourceKindInfo } from './cluster/resourceKinds';
export {
  RESOURCE_KINDS,
  kindInfo,
  isNamespaced,
  isResourceKind,
  parseResourceKind,
  collectionPath,
  apiVersion,
} from './cluster/resourceKinds';
export type { Json } from './cluster/objects';
export { isRecord, dig, str, num, objectName, objectNamespace, objectKey } from './cluster/objects';
export type { ResourceRow } from './cluster/summarize';
export { headersFor, formatDuration, summarize, summarizeAll } from './cluster/summarize';
export type { DetailSection } from './cluster/describe';
export { detailSections, formatDescribe } from './cluster/describe';
export type {
  WatchEventType,
  ResourceListing,
  Subscription,
  WatchCallbacks,
  ResourceSource,
  LogOptions,
  LogSource,
  ExecIo,
  ExecSource,
  PortForwardSource,
  ResourceActions,
  ContextInfo,
  ClusterClient,
} from './cluster/types';
export type { LoadOptions } from './cluster/KubeClient';
export { KubeClient, listContexts } from './cluster/KubeClient';

// Watchers
export type { InformerCallbacks, InformerOptions } from './watchers/ResourceInformer';
export { ResourceInformer } from './watchers/ResourceInformer';
export type { WatcherHandle, WatcherManagerOptions } from './watchers/WatcherManager';
export { WatcherManager } from './watchers/WatcherManager';

// Sessions
export type { DeliveryTarget, TerminalSession } from './sessions/types';
export type { LogStreamStatus, LogRequest, LogStreamOptions, ParsedLogLine } from './sessions/LogStream';
export { LogStream, parseLogLine, logBackoffMs, reconnectSinceSeconds } from './sessions/LogStream';
export type { ExecRequest } from './sessions/ExecSession';
export { ExecSession, DEFAULT_EXEC_COMMAND } from './sessions/ExecSession';
export type { LocalShellOptions } from './sessions/LocalShell';
export { LocalShell, defaultShell } from './sessions/LocalShell';
export type { QueryConfig } from './sessions/QuerySession';
export {
  QuerySession,
  FIELD_SEPARATOR,
  queryConfigFromEnv,
  buildPsqlCommand,
  parsePsqlOutput,
  csvEscape,
  rowToCsv,
  resultToCsv,
  columnWidths,
  SCHEMA_SQL,
  schemaFromResult,
} from './sessions/QuerySession';
export type { PortInput } from './sessions/PortForwarder';
export { PortForwardRegistry, suggestRemotePort, parsePortInput } from './sessions/PortForwarder';

// Query history, saved queries, completion
export type { QueryHistoryEntry } from './query/QueryHistory';
export { QueryHistory, MAX_HISTORY } from './query/QueryHistory';
export type { SavedQuery } from './query/SavedQueries';
export { SavedQueries, filterSavedQueries } from './query/SavedQueries';
export type { Completion, CompletionContext } from './query/completion';
export {
  MAX_COMPLETIONS,
  SQL_KEYWORDS,
  complete,
  completionContext,
  completionItems,
  tokenBeforeCursor,
  fromTables,
  aliasMap,
} from './query/completion';
