export const ETLCTL_VERSION = "0.1.0";
