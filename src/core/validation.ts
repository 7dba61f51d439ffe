import { z } from "zod";
import { DeploymentSpec, PortMapping } from "../types/job";
import { InvalidSpecError } from "./errors";

const portNumber = z
  .number()
  .int()
  .min(1, "port must be between 1 and 65535")
  .max(65535, "port must be between 1 and 65535");

const PORT_PATTERN = /^(\d{1,5}):(\d{1,5})(?:\/(tcp|udp))?$/;

/** "8080:80", "8080:80/udp" or an explicit mapping object. */
const portMappingSchema = z.union([
  z
    .string()
    .regex(PORT_PATTERN, 'port mapping must look like "8080:80" or "8080:80/udp"')
    .transform((value, ctx): PortMapping => {
      const [, host, container, protocol] = PORT_PATTERN.exec(value) ?? [];
      const mapping = {
        host: Number(host),
        container: Number(container),
        protocol: protocol === "udp" ? "udp" : "tcp",
      } as const;

      for (const port of [mapping.host, mapping.container]) {
        if (port < 1 || port > 65535) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `port ${port} in "${value}" must be between 1 and 65535`,
          });
        }
      }
      return mapping;
    }),
  z.object({
    host: portNumber,
    container: portNumber,
    protocol: z.enum(["tcp", "udp"]).default("tcp"),
  }),
]);

/** Deployment request as accepted from callers. */
export const deploymentRequestSchema = z
  .object({
    /** Deployment slot; also names the container. */
    target: z
      .string()
      .min(1, "target must not be empty")
      .max(63, "target must be at most 63 characters")
      .regex(
        /^[A-Za-z0-9][A-Za-z0-9_.-]*$/,
        "target may only contain letters, digits, '_', '.' and '-'"
      )
      // one lock and one container name per target regardless of case
      .transform((target) => target.toLowerCase()),
    /** Image reference to build or pull. */
    image: z
      .string()
      .trim()
      .min(1, "image must not be empty")
      .refine((image) => !/\s/.test(image), "image must not contain whitespace"),
    ports: z.array(portMappingSchema).default([]),
    env: z
      .record(
        z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "invalid environment variable name"),
        z.string()
      )
      .default({}),
    resources: z
      .object({
        cpus: z.number().positive().optional(),
        memoryMb: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    /** Build from source instead of pulling. */
    build: z
      .object({
        context: z.string().min(1, "build context must not be empty"),
        dockerfile: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    healthCheck: z
      .object({
        path: z.string().min(1).optional(),
        port: portNumber.optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .superRefine((request, ctx) => {
    const seen = new Set<string>();
    for (const port of request.ports) {
      const key = `${port.host}/${port.protocol}`;
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["ports"],
          message: `host port ${key} is mapped more than once`,
        });
      }
      seen.add(key);
    }
  });

export type DeploymentRequest = z.input<typeof deploymentRequestSchema>;

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

/**
 * Validate a raw request into an immutable DeploymentSpec.
 * Throws InvalidSpecError listing every problem found.
 */
export function validateDeploymentRequest(input: unknown): DeploymentSpec {
  const result = deploymentRequestSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidSpecError(result.error.issues.map(formatIssue));
  }

  const { target, image, ports, env, resources, build, healthCheck } = result.data;
  const spec: DeploymentSpec = { target, image, ports, env };
  if (resources) spec.resources = resources;
  if (build) spec.build = build;
  if (healthCheck) spec.healthCheck = healthCheck;

  return Object.freeze(spec);
}
