export type { ISecretsService } from "./secrets-service";
export type { ISecretRotationService } from "./secret-rotation";
export type {
  IStorageStatusService,
  IDatabaseStatusService,
  IClusterStatusService,
  IWarehouseStatusService,
  IOrchestrationStatusService,
} from "./resource-status";
export type { IObjectStorageService } from "./object-storage";
