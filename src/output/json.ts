export function jsonOutput(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}
