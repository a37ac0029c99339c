import type { TargetArch } from "../core/types.js";

export interface FlagBlock {
  title: string;
  lines: readonly string[];
}

function cflags(variable: string, op: "=" | "+=", values: readonly string[]): string[] {
  return [`${variable} ${op} [`, ...values.map((value) => `  "${value}",`), "]"];
}

const ARCH_CFLAGS: Record<TargetArch, readonly string[]> = {
  avx: ["-mavx"],
  avx2: ["-mavx2", "-mfma"],
  avx512: [
    "-march=skylake-avx512",
    "-mtune=skylake-avx512",
    "-mavx512f",
    "-mavx512cd",
    "-mavx512vl",
    "-mavx512bw",
    "-mavx512dq",
    "-mfma"
  ]
};

export function optimizationFlagBlocks(arch: TargetArch): FlagBlock[] {
  return [
    {
      title: "Link Time Optimization",
      lines: ["use_thin_lto = true", "use_lld = true", "thin_lto_enable_optimizations = true", "use_text_section_splitting = true"]
    },
    {
      title: "Profile Guided Optimization",
      lines: ["chrome_pgo_phase = 2", 'pgo_data_path = ""']
    },
    {
      title: "Polly High-level Optimizations",
      lines: ["use_polly = true"]
    },
    {
      title: `${arch.toUpperCase()} Optimization Flags`,
      lines: cflags("common_optimize_on_cflags", "=", ARCH_CFLAGS[arch])
    },
    {
      title: "Fast-math Optimizations",
      lines: cflags("common_optimize_on_cflags", "+=", [
        "-ffast-math",
        "-funsafe-math-optimizations",
        "-ffinite-math-only",
        "-fno-signed-zeros",
        "-fno-trapping-math",
        "-fassociative-math",
        "-freciprocal-math"
      ])
    },
    {
      title: "Vectorization Optimizations",
      lines: cflags("common_optimize_on_cflags", "+=", ["-ftree-vectorize", "-ftree-slp-vectorize", "-fvectorize", "-fslp-vectorize"])
    },
    {
      title: "Advanced Linker Optimizations",
      lines: cflags("common_optimize_on_ldflags", "=", ["-fuse-ld=lld", "-Wl,--lto-O3", "-Wl,--icf=all", "-Wl,--gc-sections"])
    },
    {
      title: "V8 Engine Optimizations",
      lines: ["v8_enable_builtins_optimization = true", "v8_enable_fast_torque = true", "v8_enable_turbofan = true"]
    }
  ];
}

export function renderFlagBlocks(blocks: readonly FlagBlock[]): string {
  return blocks.map((block) => [`# ${block.title}`, ...block.lines, ""].join("\n")).join("\n");
}
