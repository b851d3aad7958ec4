/** An ingredient with its measurement unit (reference data). */
export interface Ingredient {
  id: number;
  name: string;
  measurement_unit: string;
}
