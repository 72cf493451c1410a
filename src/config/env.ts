export type EnvMap = Readonly<Record<string, string | undefined>>;

function normalise(value: string | undefined): string {
  return value?.trim() ?? "";
}

export function readEnvValue(env: EnvMap, ...names: string[]): string {
  //1.- Resolve the first non-empty entry so earlier names take priority over compatibility aliases.
  for (const name of names) {
    const direct = normalise(env[name]);
    if (direct) {
      return direct;
    }
  }
  //2.- Fall back to an empty string when none of the keys has been configured.
  return "";
}
