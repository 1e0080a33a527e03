// SPDX-License-Identifier: Apache-2.0

export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  HomeDirectory: Symbol.for('HomeDirectory'),
  LogsDirectory: Symbol.for('LogsDirectory'),
  SilentTasks: Symbol.for('SilentTasks'),
  PromptAsk: Symbol.for('PromptAsk'),
  ProcessExit: Symbol.for('ProcessExit'),
  StrongboxLogger: Symbol.for('StrongboxLogger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  BackupConfigRuntimeState: Symbol.for('BackupConfigRuntimeState'),
  RemoteShell: Symbol.for('RemoteShell'),
  BulkTransfer: Symbol.for('BulkTransfer'),
  ScopedCleanup: Symbol.for('ScopedCleanup'),
  ConfirmationPrompt: Symbol.for('ConfirmationPrompt'),
  SnapshotStore: Symbol.for('SnapshotStore'),
  TopologyResolver: Symbol.for('TopologyResolver'),
  TunnelTransport: Symbol.for('TunnelTransport'),
  ApplianceProbe: Symbol.for('ApplianceProbe'),
  RemoteStatusReporter: Symbol.for('RemoteStatusReporter'),
  RestoreRoutines: Symbol.for('RestoreRoutines'),
  BackupRoutines: Symbol.for('BackupRoutines'),
  DatastoreDispatcher: Symbol.for('DatastoreDispatcher'),
  RestoreOrchestrator: Symbol.for('RestoreOrchestrator'),
  BackupOrchestrator: Symbol.for('BackupOrchestrator'),
  BackupCommand: Symbol.for('BackupCommand'),
  RestoreCommand: Symbol.for('RestoreCommand'),
  SnapshotCommand: Symbol.for('SnapshotCommand'),
  BackupCommandDefinition: Symbol.for('BackupCommandDefinition'),
  RestoreCommandDefinition: Symbol.for('RestoreCommandDefinition'),
  SnapshotCommandDefinition: Symbol.for('SnapshotCommandDefinition'),
  Commands: Symbol.for('Commands'),
} as const;
