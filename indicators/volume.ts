import { rollingMean } from "../utils/rolling";

export type VolumeParams = {
  volumes: readonly number[];
  maPeriod: number; // período da média de volume (default 20)
};

export class VolumeIndicator {
  /**
   * Média simples do volume. As linhas de aquecimento recebem o primeiro valor
   * definido (preenchimento para trás); série menor que o período fica toda null.
   */
  static calculate({ volumes, maPeriod }: VolumeParams): Array<number | null> {
    const vma = rollingMean(volumes, maPeriod);
    const firstDefined = vma.find((v): v is number => v != null);
    if (firstDefined === undefined) return vma;
    return vma.map((v) => v ?? firstDefined);
  }
}
