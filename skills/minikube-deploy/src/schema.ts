import { z } from "zod";

const namespaceName = z
  .string()
  .regex(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/, "namespace must be a lowercase RFC 1123 label");

export const WaitForSchema = z.object({
  selector: z.string().min(1),
  minReady: z.number().int().min(1).default(1),
  rollout: z.string().optional(), // e.g. "statefulset/kafka"; waited on before pod polling
});

export const ManifestSchema = z.union([
  z.string().min(1).transform((file) => ({ file, waitFor: undefined })),
  z.object({
    file: z.string().min(1),
    waitFor: WaitForSchema.optional(),
  }),
]);

const CommandSchema = z.object({
  description: z.string(),
  command: z.string().default("kubectl"),
  args: z.array(z.string()),
  tolerateExisting: z.boolean().default(false),
  showOutput: z.boolean().default(false),
});

export const AfterApplySchema = CommandSchema.extend({
  afterManifest: z.string(),
});

export const InstallStepSchema = CommandSchema.extend({
  waitFor: WaitForSchema.optional(),
});

export const ReadinessSchema = z
  .object({
    intervalSeconds: z.number().positive().default(10),
    timeoutSeconds: z.number().positive().default(300),
  })
  .default({ intervalSeconds: 10, timeoutSeconds: 300 });

export const NamespaceDeletionSchema = z
  .object({
    attempts: z.number().int().min(1).default(30),
    intervalSeconds: z.number().positive().default(2),
  })
  .default({ attempts: 30, intervalSeconds: 2 });

export const ComponentSchema = z
  .object({
    description: z.string().optional(),
    namespace: namespaceName,
    workingDir: z.string().optional(), // relative to baseDir; defaults to the namespace
    manifests: z.array(ManifestSchema).default([]),
    ownership: z.object({
      match: z.array(z.string().min(1)).min(1, "ownership.match needs at least one name fragment"),
      neighbours: z.array(z.string().min(1)).default([]),
      deployedWhen: z.array(z.string().min(1)).default([]),
    }),
    requires: z.string().min(1).optional(), // another component that must already be deployed
    requiredArtifacts: z.array(z.string().min(1)).optional(), // defaults to the manifest files
    artifactSource: z
      .object({
        repo: z.string().min(1),
        subdir: z.string().optional(),
      })
      .optional(),
    readiness: ReadinessSchema,
    namespaceDeletion: NamespaceDeletionSchema,
    install: z.array(InstallStepSchema).default([]),
    afterApply: z.array(AfterApplySchema).default([]),
    // "manifests" deletes only what the manifests declare, for components sharing a namespace
    removal: z.enum(["namespace", "manifests"]).default("namespace"),
  })
  .superRefine((component, ctx) => {
    if (component.manifests.length === 0 && component.install.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["manifests"],
        message: "at least one manifest or install step is required",
      });
    }
    const files = new Set(component.manifests.map((m) => m.file));
    component.afterApply.forEach((hook, i) => {
      if (!files.has(hook.afterManifest)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["afterApply", i, "afterManifest"],
          message: `afterManifest "${hook.afterManifest}" is not one of the component's manifests`,
        });
      }
    });
  });

export type ComponentConfig = z.infer<typeof ComponentSchema>;

export const ConfigSchema = z.object({
  expectedUser: z.string().optional(), // if omitted, the identity check is skipped
  baseDir: z.string().default("/opt/minikube/namespaces"),
  auditLog: z.string().default("./mkdeploy-audit.log"),
  conflict: z
    .object({
      onInvalidInput: z.enum(["reprompt", "abort"]).default("reprompt"),
      maxAttempts: z.number().int().min(1).default(3),
    })
    .default({ onInvalidInput: "reprompt", maxAttempts: 3 }),
  uninstall: z
    .object({
      waitForDeletion: z.boolean().default(true),
    })
    .default({ waitForDeletion: true }),
  components: z.record(z.string(), ComponentSchema),
}).superRefine((config, ctx) => {
  for (const [name, component] of Object.entries(config.components)) {
    if (component.requires === undefined) continue;
    const required = config.components[component.requires];
    if (!required) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["components", name, "requires"],
        message: `unknown component "${component.requires}"`,
      });
    } else if (required.namespace !== component.namespace) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["components", name, "requires"],
        message: `"${component.requires}" deploys into "${required.namespace}", not "${component.namespace}"`,
      });
    }
  }
});

export type DeployConfig = z.infer<typeof ConfigSchema>;
