/** Options accepted by every command */
export interface GlobalOptions {
  server?: string;
}
