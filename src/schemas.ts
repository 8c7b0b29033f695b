import { z } from 'zod';

/** Schema for one entry of `nix-env -qaP --json --out-path` */
const NixEnvPackageSchema = z.object({
  name: z.string(),
  pname: z.string().optional(),
  version: z.string().optional(),
  system: z.string().optional(),
  // Outputs nix-env could not compute a path for come back as null
  outputs: z.record(z.string(), z.string().nullable()).default({}),
});

/** Schema for the complete `nix-env --json` listing, keyed by attribute path */
export const NixEnvListingSchema = z.record(z.string(), NixEnvPackageSchema);

/** `nix-instantiate --eval --json` of an expression that evaluates to a string */
export const NixEvalStringSchema = z.string();
