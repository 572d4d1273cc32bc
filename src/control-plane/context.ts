import { createFileServices, type PlancraftServices } from '../services.js';

/**
 * Supplies the services a command runs against. Resolved lazily so that
 * `--help` never touches the data directory.
 */
export type ServiceProvider = () => PlancraftServices;

let fileServices: PlancraftServices | null = null;

export const defaultServiceProvider: ServiceProvider = () => {
  if (!fileServices) {
    fileServices = createFileServices();
  }
  return fileServices;
};
