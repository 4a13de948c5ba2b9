export type Amenity =
  | "pool"
  | "security"
  | "gym"
  | "parking"
  | "garden"
  | "balcony"
  | "view"
  | "kitchen"
  | "laundry"
  | "elevator"
  | "air_conditioning"
  | "fireplace";

export interface AgentInfo {
  name?: string;
  agency?: string;
  agent_url?: string;
  agency_url?: string;
}

export interface RoomInfo {
  count: string;
  details: string[];
}

export interface PointOfInterest {
  name: string;
  distance: string;
}

export interface PropertyRecord {
  property_url: string;
  source: string;
  scraped_date: string;
  listing_id?: string;

  // Listing text
  title?: string;
  description?: string;

  // Price information
  price?: number;
  currency?: string;
  price_per_sqm?: number;
  // Monthly charges as shown on the listing, e.g. "R 1 850"
  levies?: string | number;
  rates_and_taxes?: string | number;
  no_transfer_duty?: string;

  // Property details
  property_type?: string;
  bedrooms?: number;
  bathrooms?: number;
  parking?: number;
  floor_size?: number;
  erf_size?: string;
  lifestyle?: string;
  pets_allowed?: string;

  // Address fields
  address?: string;
  suburb?: string;
  city?: string;
  province?: string;
  latitude?: number;
  longitude?: number;

  // Listing information
  listing_date?: string;
  image_url?: string;
  agent?: AgentInfo;
  amenities?: Partial<Record<Amenity, boolean>>;

  // Overview panels, keyed by normalized label
  rooms?: Record<string, RoomInfo>;
  external_features?: Record<string, string>;
  // Keyed by normalized category, e.g. "schools"
  points_of_interest?: Record<string, PointOfInterest[]>;
}

export interface ScraperOptions {
  timeout?: number;
  userAgent?: string;
}

export interface ScraperResult {
  success: boolean;
  errors: string[];
  message: string;
  property?: PropertyRecord;
}

export interface TransferDutyBracket {
  /** Inclusive upper bound of the bracket. */
  upTo: number;
  base: number;
  rate: number;
  /** Threshold the marginal rate applies above. */
  over: number;
}

export interface MonthlyLineItems {
  insurance: boolean;
  maintenance: boolean;
  utilities: boolean;
  security: boolean;
}

export interface FinanceConfig {
  transferDutyBrackets: TransferDutyBracket[];
  interestRate: number;
  bondTermYears: number;
  monthlyItems: MonthlyLineItems;
}

export interface OnceOffCosts {
  readonly deposit: number;
  readonly transferDuty: number;
  readonly bondRegistration: number;
  readonly transferCosts: number;
  readonly attorneyFees: number;
  readonly bondOrigination: number;
  readonly movingCosts: number;
  readonly securitySetup: number;
  readonly immediateRepairs: number;
  readonly total: number;
  /** Purchase price plus total. */
  readonly grandTotal: number;
}

export interface MonthlyCostInput {
  bondAmount: number;
  levies?: unknown;
  ratesTaxes?: unknown;
  price: number;
}

export interface MonthlyCosts {
  readonly bondPayment: number;
  readonly levies: number;
  readonly ratesTaxes: number;
  readonly insurance: number;
  readonly maintenance: number;
  readonly utilities: number;
  readonly security: number;
  readonly total: number;
}

export interface NoteLocation {
  province: string;
  city: string;
  suburb: string;
}

export interface PropertyNote {
  filename: string;
  content: string;
  location: NoteLocation;
  metadata: {
    price: number;
    bedrooms?: number;
    bathrooms?: number;
    monthly_cost: number;
  };
}
