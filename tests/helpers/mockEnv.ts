type EnvPatch = Record<string, string | undefined>;

function apply(vars: EnvPatch): EnvPatch {
  const prev: EnvPatch = {};
  for (const [k, v] of Object.entries(vars)) {
    prev[k] = process.env[k];
    if (v === undefined) delete process.env[k]; else process.env[k] = v;
  }
  return prev;
}

// Runs `fn` with the patched environment; `undefined` unsets a variable.
export function withEnv<T>(vars: EnvPatch, fn: () => T): T {
  const prev = apply(vars);
  try {
    return fn();
  } finally {
    apply(prev);
  }
}
