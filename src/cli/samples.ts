export interface SampleIncident {
  key: string;
  name: string;
  errorLog: string;
}

export const SAMPLE_INCIDENTS: readonly SampleIncident[] = [
  {
    key: "1",
    name: "Postgres connection refused",
    errorLog: `Error: connect ECONNREFUSED 10.0.3.12:5432
    at TCPConnectWrap.afterConnect [as oncomplete] (node:net:1595:16)
    at Pool.connect (/srv/orders/node_modules/pg-pool/index.js:45:11)
    at OrderRepository.findPending (/srv/orders/src/repositories/orders.js:31:22)
orders-api exited with code 1 after 5 connection attempts`
  },
  {
    key: "2",
    name: "Container killed for memory",
    errorLog: `$ docker logs report-worker
[worker] loading 1.8M rows for the monthly export
[worker] building aggregates...
Killed

$ docker inspect report-worker --format '{{.State.OOMKilled}} {{.HostConfig.Memory}}'
true 1073741824`
  },
  {
    key: "3",
    name: "Kubernetes image pull failing",
    errorLog: `$ kubectl get pods -n billing
NAME                           READY   STATUS             RESTARTS   AGE
invoices-6c8d9b7f4-k2lqz       0/1     ImagePullBackOff   0          7m

$ kubectl describe pod invoices-6c8d9b7f4-k2lqz -n billing
  Warning  Failed   6m   kubelet  Failed to pull image "registry.internal/billing/invoices:2.14.0": manifest unknown
  Warning  Failed   6m   kubelet  Error: ErrImagePull`
  },
  {
    key: "4",
    name: "Nginx 502 from upstream",
    errorLog: `2026/03/04 05:06:07 [error] 31#31: *4411 upstream prematurely closed connection while reading response header from upstream,
client: 172.20.0.1, server: shop.local, request: "POST /checkout HTTP/1.1", upstream: "http://172.20.0.5:3000/checkout", host: "shop.local"
172.20.0.1 - - [04/Mar/2026:05:06:07 +0000] "POST /checkout HTTP/1.1" 502 157`
  },
  {
    key: "5",
    name: "Redis refusing writes",
    errorLog: `ReplyError: MISCONF Redis is configured to save RDB snapshots, but it's currently unable to persist to disk.
Commands that may modify the data set are disabled.
    at parseError (/srv/sessions/node_modules/redis-parser/lib/parser.js:179:12)
    at SessionStore.touch (/srv/sessions/src/store.js:58:18)`
  }
];

export type MenuChoice =
  | { kind: "sample"; sample: SampleIncident }
  | { kind: "custom" }
  | { kind: "quit" }
  | { kind: "invalid"; input: string };

export function parseMenuChoice(input: string, samples: readonly SampleIncident[] = SAMPLE_INCIDENTS): MenuChoice {
  const choice = input.trim().toUpperCase();
  if (choice === "Q") {
    return { kind: "quit" };
  }
  if (choice === "C") {
    return { kind: "custom" };
  }
  const sample = samples.find((candidate) => candidate.key === choice);
  return sample ? { kind: "sample", sample } : { kind: "invalid", input: input.trim() };
}

export function renderMenu(samples: readonly SampleIncident[] = SAMPLE_INCIDENTS): string {
  const first = samples[0]?.key ?? "1";
  const last = samples.at(-1)?.key ?? first;
  return [
    "Choose an option:",
    `  [${first}-${last}] Investigate a sample incident`,
    "  [C]   Paste a custom error log",
    "  [Q]   Quit",
    "",
    "Sample incidents:",
    ...samples.map((sample) => `  ${sample.key}. ${sample.name}`),
    ""
  ].join("\n");
}
