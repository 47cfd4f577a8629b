export type AddressFamily = "ipv4" | "ipv6";
export type Direction = "in" | "out";
export type SimpleProtocol = "icmp" | "gre" | "esp";
export type PortProtocol = "tcp" | "udp";
export type Protocol = SimpleProtocol | PortProtocol;
export type LogLevel = "debug" | "info" | "warn" | "error";

// Structural logger; `console` satisfies it.
export type Logger = {
  debug?: (message: string) => void;
  info?: (message: string) => void;
  warn?: (message: string) => void;
  error?: (message: string) => void;
};

/** Network block; `network` always has its host bits cleared. */
export type Cidr = {
  family: AddressFamily;
  network: string;
  prefix: number;
};

/** Inclusive, 1 <= start <= end <= 65535. */
export type PortRange = {
  start: number;
  end: number;
};

type RuleBase = {
  direction: Direction;
  sources: string[];
  destinations: string[];
};

export type SimpleRuleSpec = RuleBase & {
  protocol: SimpleProtocol;
};

export type PortRuleSpec = RuleBase & {
  protocol: PortProtocol;
  ports: PortRange[];
};

export type RuleSpec = SimpleRuleSpec | PortRuleSpec;

export type RuleOptions = {
  icmp: boolean;
  gre: boolean;
  esp: boolean;
  tcp: PortRange[];
  udp: PortRange[];
};

export type Firewall = {
  id: number;
  name: string;
  rules: RuleSpec[];
};

export type Account = {
  label: string;
  token: string;
  firewallName: string;
};

// Firewall API collaborator, bound to a single account's credential.
export type FirewallApi = {
  findFirewall: (name: string) => Promise<Firewall | null>;
  createFirewall: (name: string, rules: RuleSpec[]) => Promise<Firewall>;
  updateFirewallRules: (id: number, rules: RuleSpec[]) => Promise<void>;
};

// IP discovery collaborator. Returns the bare address or throws.
export type AddressDiscovery = {
  discover: (family: AddressFamily) => Promise<string>;
};

export type DiscoveryFailure = {
  family: AddressFamily;
  message: string;
};

export type AddressSet = {
  sources: Cidr[];
  discovered: Partial<Record<AddressFamily, Cidr>>;
  failures: DiscoveryFailure[];
};

export type FailureStage = "lookup" | "create" | "apply";

export type AccountOutcome =
  | {
      status: "in-sync" | "applied";
      account: string;
      firewallName: string;
      firewallId: number;
      created: boolean;
    }
  | {
      status: "drift";
      account: string;
      firewallName: string;
      firewallId: number | null;
    }
  | {
      status: "failed";
      account: string;
      firewallName: string;
      stage: FailureStage;
      error: string;
    };

export type CycleReport = {
  startedAt: string;
  durationMs: number;
  sources: string[];
  discoveryFailures: DiscoveryFailure[];
  rules: RuleSpec[];
  outcomes: AccountOutcome[];
  failed: number;
};
