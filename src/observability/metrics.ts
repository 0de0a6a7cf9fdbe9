import { metrics } from "@opentelemetry/api";

const meter = metrics.getMeter("catalog-identity-service");

const httpDurationHistogram = meter.createHistogram(
  "catalog_http_server_duration_ms",
  {
    description: "Latency for incoming HTTP requests handled by the catalog",
    unit: "ms",
  }
);

const httpRequestCounter = meter.createCounter(
  "catalog_http_server_requests_total",
  {
    description: "Total HTTP requests handled by the catalog",
  }
);

const aggregationCounter = meter.createCounter(
  "catalog_aggregation_runs_total",
  {
    description: "Series metadata recomputations",
  }
);

const permissionMutationCounter = meter.createCounter(
  "catalog_permission_mutations_total",
  {
    description: "Edit permission grants and revocations",
  }
);

const lockWaitHistogram = meter.createHistogram("catalog_lock_wait_ms", {
  description: "Time spent waiting on a contended per-resource lock",
  unit: "ms",
});

export type HttpMetricAttributes = {
  method: string;
  route: string;
  statusClass: string;
};

export function recordHttpRequest(
  durationMs: number,
  attributes: HttpMetricAttributes
) {
  const labels = {
    http_method: attributes.method,
    http_route: attributes.route,
    http_status_class: attributes.statusClass,
  };
  httpDurationHistogram.record(durationMs, labels);
  httpRequestCounter.add(1, labels);
}

export function recordAggregation(unitCount: number) {
  aggregationCounter.add(1, {
    has_units: unitCount > 0 ? "true" : "false",
  });
}

export type PermissionMutation = "grant" | "revoke";

export function recordPermissionMutation(
  mutation: PermissionMutation,
  targetType: string,
  changed: boolean
) {
  permissionMutationCounter.add(1, {
    mutation,
    target_type: targetType,
    changed: changed ? "true" : "false",
  });
}

export function recordLockWait(scope: string, waitedMs: number) {
  lockWaitHistogram.record(waitedMs, { lock_scope: scope });
}
