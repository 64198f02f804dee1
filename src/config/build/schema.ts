/**
 * Run configuration schemas.
 *
 * A run configuration is validated once at startup and then treated as
 * read-only. Installers and the generation pipeline receive it by value;
 * there is no process-wide mutable default.
 */

import { z } from "zod";
import { BuildMode, CompilerFamily } from "./enums.js";
import {
  DEFAULT_DOCKER_IMAGE,
  DEFAULT_LINKER_CONFIG,
  DEFAULT_REMOTES,
} from "./defaults.js";

/**
 * A dependency selected either by pinned version or by local source tree.
 * Exactly one of the two must be non-empty.
 */
export const SourceSelectionSchema = z
  .object({
    version: z.string().optional(),
    source: z.string().optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    const hasVersion = Boolean(value.version);
    const hasSource = Boolean(value.source);
    if (hasVersion && hasSource) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Must have only version OR source, not both (version='${value.version}', source='${value.source}')`,
      });
    } else if (!hasVersion && !hasSource) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Must have a version OR a source, not neither",
      });
    }
  });

export type SourceSelection = z.infer<typeof SourceSelectionSchema>;

export const RemotesSchema = z
  .object({
    pybind11: z.string().min(1).default(DEFAULT_REMOTES.pybind11),
    binder: z.string().min(1).default(DEFAULT_REMOTES.binder),
    llvm: z.string().min(1).default(DEFAULT_REMOTES.llvm),
  })
  .strict();

export type Remotes = z.infer<typeof RemotesSchema>;

export const LinkerConfigSchema = z
  .object({
    configDir: z.string().min(1).default(DEFAULT_LINKER_CONFIG.configDir),
    configFile: z.string().min(1).default(DEFAULT_LINKER_CONFIG.configFile),
    runtimeLibDir: z.string().min(1).default(DEFAULT_LINKER_CONFIG.runtimeLibDir),
  })
  .strict();

export type LinkerConfig = z.infer<typeof LinkerConfigSchema>;

/**
 * Configuration for one installation run.
 */
export const InstallConfigSchema = z
  .object({
    /** Output directory for the toolchain, Binder, pybind11 and ENVFILE */
    buildPath: z.string().min(1),
    binder: SourceSelectionSchema,
    pybind11: SourceSelectionSchema,
    llvm: SourceSelectionSchema,
    /** Compiler family for the first bootstrap pass */
    compiler: CompilerFamily.default("clang"),
    buildMode: BuildMode.default("Release"),
    /** Parallel jobs handed to ninja; 0 is resolved to the CPU count by the caller */
    jobs: z.number().int().min(1).default(1),
    /** Stage sources without building anything */
    prepareOnly: z.boolean().default(false),
    remotes: RemotesSchema.default({}),
    linker: LinkerConfigSchema.default({}),
  })
  .strict();

export type InstallConfig = z.infer<typeof InstallConfigSchema>;
export type InstallConfigInput = z.input<typeof InstallConfigSchema>;

const PYTHON_KEYWORDS: readonly string[] = [
  "False", "None", "True", "and", "as", "assert", "async", "await",
  "break", "class", "continue", "def", "del", "elif", "else", "except",
  "finally", "for", "from", "global", "if", "import", "in", "is",
  "lambda", "nonlocal", "not", "or", "pass", "raise", "return", "try",
  "while", "with", "yield",
];

/**
 * Python module names must be importable identifiers.
 */
const ModuleName = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "Module name must be a valid Python identifier")
  .refine((name) => !PYTHON_KEYWORDS.includes(name), {
    message: "Module name must not be a Python keyword",
  });

/**
 * Configuration for one generation run.
 */
export const GenerateConfigSchema = z
  .object({
    /** Directory the bindings are generated, configured and built in */
    outputDirectory: z.string().min(1),
    moduleName: ModuleName,
    /** Project source directories scanned for includes and compilation units */
    projectSources: z.array(z.string().min(1)).min(1),
    /** Extra include directories needed to compile the project */
    sourceDirectoriesToInclude: z.array(z.string().min(1)).default([]),
    /** Binder config file */
    configFile: z.string().min(1),
    /** Extra Binder flags, whitespace separated (e.g. "--trace --annotate-includes") */
    extraBinderFlags: z.string().default(""),
    /** Include lines containing any of these substrings are dropped */
    includeLineIgnoreWords: z.array(z.string().min(1)).default([]),
    /** Shell script run before Binder */
    preinstallScript: z.string().optional(),
    /** Use this includes file instead of collecting one */
    customAllIncludesFile: z.string().optional(),
    /** pybind11 source tree (the directory holding include/) */
    pybind11Source: z.string().min(1),
    binderExecutable: z.string().min(1).default("binder"),
    /** Interpreter used for the include path lookup and the import smoke test */
    pythonExecutable: z.string().min(1).default("python3"),
    /** Parallel jobs handed to ninja; unset leaves ninja's default */
    jobs: z.number().int().min(1).optional(),
  })
  .strict();

export type GenerateConfig = z.infer<typeof GenerateConfigSchema>;
export type GenerateConfigInput = z.input<typeof GenerateConfigSchema>;

/**
 * Container re-invocation settings for the `dbuild` mode.
 */
export const ContainerConfigSchema = z
  .object({
    dockerImage: z.string().min(1).default(DEFAULT_DOCKER_IMAGE),
    /** Host working directory mounted into the container at the same path */
    workdir: z.string().min(1),
  })
  .strict();

export type ContainerConfig = z.infer<typeof ContainerConfigSchema>;
