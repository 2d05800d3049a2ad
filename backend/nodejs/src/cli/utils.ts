/**
 * Commander option parser that accepts repeated flags as well as
 * comma-separated lists: `--to a@x.com,b@x.com --to c@x.com`.
 */
export function collectAddresses(value: string, previous: string[] = []) {
  const addresses = value
    .split(',')
    .map((address) => address.trim())
    .filter((address) => address.length > 0)

  return [...previous, ...addresses]
}
