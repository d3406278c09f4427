// src/output_writer/writer.ts

import * as fs from "fs";
import * as path from "path";

import { DiffTooLargeError } from "../line_diff";
import { atomicWriteFileSync, FsyncMode } from "./atomic_write";
import { applyUnifiedDiff, createUnifiedDiff } from "./unified_patch";

export type OutputWriterErrorCode = "SAME_PATH" | "PATCH_VERIFY_FAILED";

export class OutputWriterError extends Error {
    constructor(public readonly code: OutputWriterErrorCode, message: string) {
        super(message);
        this.name = "OutputWriterError";
    }
}

export interface WriteAnnotatedParams {
    inputPath: string;
    original: string;
    annotated: string;
    /** Defaults to `<inputPath>.new`. */
    outputPath?: string;
    /**
     * Also write `<inputPath>.patch`, verified by re-applying it. The `.new`
     * file is written first; a diff too large to compute only adds a warning.
     */
    patch: boolean;
    fsyncMode?: FsyncMode;
}

export interface WriteAnnotatedResult {
    outputPath: string;
    patchPath?: string;
    warnings: string[];
}

export function outputPathFor(inputPath: string): string {
    return `${inputPath}.new`;
}

export function patchPathFor(inputPath: string): string {
    return `${inputPath}.patch`;
}

function inputMode(inputPath: string): number {
    return fs.existsSync(inputPath) ? fs.statSync(inputPath).mode & 0o777 : 0o644;
}

export function writeAnnotatedOutput(params: WriteAnnotatedParams): WriteAnnotatedResult {
    const { inputPath, original, annotated } = params;
    const outputPath = params.outputPath ?? outputPathFor(inputPath);
    const fsyncMode = params.fsyncMode ?? "BEST_EFFORT";
    const warnings: string[] = [];

    if (path.resolve(outputPath) === path.resolve(inputPath)) {
        throw new OutputWriterError("SAME_PATH", `Refusing to overwrite the input file: ${inputPath}`);
    }

    const mode = inputMode(inputPath);
    atomicWriteFileSync({ filePath: outputPath, content: annotated, mode, fsyncMode, warnings });

    if (!params.patch) {
        return { outputPath, warnings };
    }

    let patchText: string;
    try {
        patchText = createUnifiedDiff(original, annotated, { path: path.basename(inputPath) });
    } catch (e) {
        if (e instanceof DiffTooLargeError) {
            warnings.push(`No patch written for ${inputPath}: ${e.message}`);
            return { outputPath, warnings };
        }
        throw e;
    }
    if (patchText !== "") {
        const check = applyUnifiedDiff(original, patchText);
        if (!check.ok || check.text !== annotated) {
            throw new OutputWriterError(
                "PATCH_VERIFY_FAILED",
                `Generated patch does not reproduce the output: ${check.error ?? "content differs"}`
            );
        }
    }

    const patchPath = patchPathFor(inputPath);
    atomicWriteFileSync({ filePath: patchPath, content: patchText, mode: 0o644, fsyncMode, warnings });
    return { outputPath, patchPath, warnings };
}
