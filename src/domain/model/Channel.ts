/** A named FIFO living inside a private temporary directory. Single use. */
export interface Channel {
  /** Absolute path of the FIFO entry. */
  readonly path: string;
  /** Private directory that holds the FIFO; removed together with it. */
  readonly directory: string;
  readonly tableName: string;
}
