export type VeniceConfig = {
  /** Path of the `.vn` file to compile. */
  input: string;
  /** Dump every intermediate form and keep the `.s` and `.o` files. */
  debug: boolean;
  /** Shared object providing the runtime entry points. */
  runtime: string;
};
