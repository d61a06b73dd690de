// Core domain types - fundamental building blocks
export type BikeModel =
  | 'Speedster 3000'
  | 'Trail King Pro'
  | 'City Commuter E-3'
  | 'Gravel Explorer'
  | 'Aero Blade Race';
export type Category = 'Road' | 'Mountain' | 'City' | 'Electric' | 'BMX';
export type Region = 'North America' | 'Europe' | 'Asia' | 'Oceania';

// One generated sale (a type alias, so it is assignable to DataRow)
export type SaleRecord = {
  bike_model: BikeModel;
  category: Category;
  region: Region;
  price_usd: number;
  units_sold: number;
  total_sales_usd: number;
  date: string; // YYYY-MM-DD
};

// Roll-up of sales by model, category and region
export interface SalesSummaryRow {
  bike_model: string;
  category: string;
  region: string;
  total_units: number;
  total_revenue: number;
}

// Filter state - empty lists and a null threshold mean "no filter"
export interface FilterState {
  categories: Category[];
  regions: Region[];
  models: BikeModel[];
  minRevenue: number | null;
}
