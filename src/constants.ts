export const RUNTIME_API_GROUP = "infrastructuremanager.io";
export const RUNTIME_API_VERSION = "v1";
export const RUNTIME_PLURAL = "runtimes";
export const GARDENER_CLUSTER_PLURAL = "gardenerclusters";

export const GARDENER_API_GROUP = "core.gardener.cloud";
export const GARDENER_API_VERSION = "v1beta1";
export const SHOOT_PLURAL = "shoots";
export const SEED_PLURAL = "seeds";

export const RUNTIME_FINALIZER = "runtime-controller.infrastructure-manager.io/deletion-hook";

// Annotations written on Shoots
export const ANNOTATION_RUNTIME_GENERATION = "infrastructure-manager.io/runtime-generation";
export const ANNOTATION_RUNTIME_ID = "infrastructure-manager.io/runtime-id";
export const ANNOTATION_LICENCE_TYPE = "infrastructure-manager.io/licence-type";
export const ANNOTATION_DELETION_CONFIRMATION = "confirmation.gardener.cloud/deletion";

// Kubeconfig secret lifecycle
export const ANNOTATION_LAST_SYNC = "infrastructure-manager.io/last-sync";
export const ANNOTATION_FORCE_ROTATION = "infrastructure-manager.io/force-kubeconfig-rotation";
export const LABEL_CLUSTER_NAME = "infrastructure-manager.io/cluster-name";
export const LABEL_MANAGED_BY = "infrastructure-manager.io/managed-by";
export const MANAGED_BY_VALUE = "infrastructure-manager";

export const LABEL_RUNTIME_ID = "infrastructure-manager.io/runtime-id";
export const LABEL_GLOBAL_ACCOUNT_ID = "infrastructure-manager.io/global-account-id";
