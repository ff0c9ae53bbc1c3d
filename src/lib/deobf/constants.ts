export const DEOBF = 'deobf'

/** Appended to a target configuration's name to name its deobfuscation source */
export const DEOBF_SUFFIX = DEOBF.charAt(0).toUpperCase() + DEOBF.slice(1)

/** Internal configuration that receives every original, obfuscated dependency */
export const OBFUSCATED_CONFIGURATION_NAME = '__obfuscated'

export function deobfConfigurationName(targetConfigurationName: string): string {
  return targetConfigurationName + DEOBF_SUFFIX
}
