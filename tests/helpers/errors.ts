import { RegistryError, type RegistryErrorCode } from "../../src/core/errors";

/** Run `fn` and return the code of the RegistryError it throws. */
export const codeOf = (fn: () => unknown): RegistryErrorCode | undefined => {
  try {
    fn();
  } catch (err) {
    if (err instanceof RegistryError) return err.code;
    throw err;
  }
  return undefined;
};
