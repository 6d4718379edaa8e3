export interface StateOfMind {
  associations: string[];
  kind: string;
  labels: string[];
  valence: number;
  valenceClassification: string;
  end?: Date;
  id?: string;
  start?: Date;
}
