export {
  createHealthCheck,
  ServiceStatusCheck,
  HttpCheck,
  TcpCheck,
  ExecCheck,
  CommandCheck,
  type HealthCheck,
  type HealthCheckDeps,
  type FetchFn,
} from "./checks.ts";

export {
  HealthProber,
  DEFAULT_HEALTH_PROBER_CONFIG,
  PROBE_CANCELLED_MESSAGE,
  type HealthProberConfig,
  type ProbeOptions,
} from "./health-prober.ts";
