// Type declarations for the parts of jstat Lemma calls

declare module 'jstat' {
  export interface jStat {
    binomial: {
      pdf(k: number, n: number, p: number): number;
    };
  }

  const jStat: jStat;
  export default jStat;
}
