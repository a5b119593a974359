/** Full pam-manager configuration. */
export interface PamManagerConfig {
  directories: {
    /** Live PAM directory; only root may change it. */
    system: string;
    /** Directory used when not running as root. */
    sandbox: string;
  };
  backup: {
    /** Per-file backups; null means `<active dir>.backups`. */
    directory: string | null;
    /** Whole-directory snapshot; null means `<active dir>.backup`. */
    snapshot_directory: string | null;
  };
  output: {
    json: boolean;
  };
}
