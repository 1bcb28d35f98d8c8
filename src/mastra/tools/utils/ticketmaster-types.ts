export interface TicketmasterVenue {
  name?: string;
  address?: { line1?: string };
  city?: { name?: string };
  state?: { stateCode?: string; name?: string };
  location?: { latitude?: string; longitude?: string };
}

export interface TicketmasterPriceRange {
  type?: string;
  currency?: string;
  min?: number;
  max?: number;
}

export interface TicketmasterClassification {
  segment?: { name?: string };
  genre?: { name?: string };
}

export interface TicketmasterEvent {
  id?: string;
  name?: string;
  description?: string;
  info?: string;
  pleaseNote?: string;
  url?: string;
  images?: { url?: string }[];
  dates?: {
    start?: {
      localDate?: string;
      localTime?: string;
    };
  };
  priceRanges?: TicketmasterPriceRange[];
  classifications?: TicketmasterClassification[];
  _embedded?: {
    venues?: TicketmasterVenue[];
  };
}

export interface TicketmasterSearchResponse {
  _embedded?: {
    events?: TicketmasterEvent[];
  };
  page?: {
    size?: number;
    totalElements?: number;
    totalPages?: number;
    number?: number;
  };
  fault?: {
    faultstring?: string;
  };
}
