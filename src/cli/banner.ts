const BANNER = `
  ┬─┐┌─┐┌─┐┌┬┐┬  ┌─┐┌─┐
  ├┬┘├┤ ├─┤ ││││  │ ││ ┬
  ┴└─└─┘┴ ┴─┴┘┴─┘└─┘└─┘
`;

const TAGLINES = [
  "Every page, on the record.",
  "What you read, when you read it.",
  "Shelves remember.",
  "One more chapter.",
];

export function printBanner(version: string): void {
  const tagline = TAGLINES[Math.floor(Math.random() * TAGLINES.length)];
  console.log(BANNER);
  console.log(`  v${version} · ${tagline}\n`);
}
