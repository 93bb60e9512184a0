/** Layered station config. */
export type SequencerConfig = {
  finalizer_affects_verdict: boolean;
  /** Default wait for an operator response, in seconds. 0 waits indefinitely. */
  interaction_timeout_s: number;
};

export type SecretsConfig = {
  env_prefix: string;
  declared: string[];
  /** JSON keystore provisioned by the host, consulted after overrides and env. */
  keystore_file?: string;
};

export type StationConfig = {
  schema_version: string;
  station_id: string;
  artifacts_dir: string;
  sequencer?: Partial<SequencerConfig>;
  secrets?: Partial<SecretsConfig>;
};
