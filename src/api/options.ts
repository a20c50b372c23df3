import type { Container } from '../container';

/** Options every route plugin is registered with. */
export interface ApiOptions {
  container: Container;
}
