export const digestAlgorithms = ["mixer", "sha256"] as const;

export type DigestAlgorithm = (typeof digestAlgorithms)[number];
