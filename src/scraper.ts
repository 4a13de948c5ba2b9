import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { z } from "zod";
import { extractNumericValue } from "./finance";
import type {
  AgentInfo,
  Amenity,
  PointOfInterest,
  PropertyRecord,
  RoomInfo,
  ScraperOptions,
  ScraperResult,
} from "./types";
import { formatTimestamp } from "./utils/dates";

export const BASE_URL = "https://www.property24.com";

const AMENITY_KEYWORDS: Record<Amenity, string[]> = {
  pool: ["pool", "swimming"],
  security: ["security", "24-hour", "access control", "secure"],
  gym: ["gym", "fitness", "exercise"],
  parking: ["parking", "garage", "carport"],
  garden: ["garden", "landscaped", "outdoor space"],
  balcony: ["balcony", "terrace", "patio"],
  view: ["view", "mountain view", "sea view", "city view"],
  kitchen: ["kitchen", "modern kitchen", "fitted kitchen"],
  laundry: ["laundry", "washing"],
  elevator: ["elevator", "lift"],
  air_conditioning: ["air conditioning", "aircon", "climate control"],
  fireplace: ["fireplace", "braai"],
};

const DESCRIPTION_SELECTORS = [
  'div[class*="description"]',
  'div[class*="content"]',
  'div[class*="detail"]',
];

// Listing fields are loosely typed on the page, so each one falls back to
// undefined instead of failing the whole block.
const text = z.string().optional().catch(undefined);
const scalar = z.union([z.string(), z.number()]).optional().catch(undefined);

const jsonLdListingSchema = z.object({
  "@type": z.literal("RealEstateListing"),
  name: text,
  description: text,
  image: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .catch(undefined),
  datePosted: scalar,
  about: z
    .object({
      "@type": text,
      numberOfBedrooms: scalar,
      numberOfBathroomsTotal: scalar,
      floorSize: z.object({ value: scalar }).optional().catch(undefined),
      address: z
        .object({
          streetAddress: text,
          addressLocality: text,
          addressRegion: text,
        })
        .optional()
        .catch(undefined),
      latitude: scalar,
      longitude: scalar,
      petsAllowed: z
        .union([z.boolean(), z.string()])
        .optional()
        .catch(undefined),
    })
    .optional()
    .catch(undefined),
  offers: z
    .object({
      url: text,
      priceSpecification: z
        .object({ price: scalar, priceCurrency: text })
        .optional()
        .catch(undefined),
      offeredBy: z
        .object({
          name: text,
          url: text,
          worksFor: z
            .object({ name: text, url: text })
            .optional()
            .catch(undefined),
        })
        .optional()
        .catch(undefined),
    })
    .optional()
    .catch(undefined),
});

type JsonLdListing = z.infer<typeof jsonLdListingSchema>;

interface UrlLocation {
  suburb?: string;
  city?: string;
  province?: string;
  listingId?: string;
}

export class Property24Scraper {
  private options: ScraperOptions;

  constructor(options: ScraperOptions = {}) {
    this.options = {
      timeout: 30000,
      ...options,
    };
  }

  async scrapeListing(url: string): Promise<ScraperResult> {
    const errors: string[] = [];

    if (!url.toLowerCase().includes("property24")) {
      const message = "Currently only Property24 URLs are supported";
      return { success: false, errors: [message], message };
    }

    try {
      console.log(`🔍 Scraping listing: ${url}`);
      const html = await this.fetchPage(url);
      const property = this.parseListing(html, url);
      console.log(
        `✓ Parsed listing ${property.listing_id ?? "(no listing id)"}`
      );

      return {
        success: true,
        errors,
        message: `Successfully scraped ${property.title ?? url}`,
        property,
      };
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      errors.push(errorMessage);
      console.error("✗ Scraping error:", errorMessage);

      return {
        success: false,
        errors,
        message: `Failed to scrape listing: ${errorMessage}`,
      };
    }
  }

  private async fetchPage(url: string): Promise<string> {
    const headers: Record<string, string> = {};
    if (this.options.userAgent) {
      headers["User-Agent"] = this.options.userAgent;
    }

    const response = await fetch(url, {
      headers,
      signal: AbortSignal.timeout(this.options.timeout ?? 30000),
    });
    if (!response.ok) {
      throw new Error(
        `Request to ${url} failed with status ${response.status}`
      );
    }
    return response.text();
  }

  parseListing(
    html: string,
    url: string,
    now: Date = new Date()
  ): PropertyRecord {
    const $ = cheerio.load(html);

    const fromUrl = this.parseListingUrl(url);
    const listing = this.extractFromJsonLd($);
    const overview = this.extractOverview($);

    // Script bodies would otherwise leak into the text fallbacks
    $("script, style, noscript").remove();
    const allText = $("body").text();

    const about = listing?.about;
    const offers = listing?.offers;
    const address = about?.address;
    const image = listing?.image;

    const price =
      toNumber(offers?.priceSpecification?.price) ?? this.findPrice(allText);
    const floorSize =
      toNumber(about?.floorSize?.value) ??
      leadingNumber(overview.floor_size) ??
      matchNumber(allText, /(\d+)\s*(?:m²|m2|sqm)/i);
    const pricePerSqm = extractNumericValue(
      overview.price_per_m2?.replace(/m2|m²/gi, "")
    );

    const record: PropertyRecord = {
      property_url: url,
      source: "Property24",
      scraped_date: formatTimestamp(now),
      listing_id:
        fromUrl.listingId ?? overview.listing_number?.replace(/^P24-/i, ""),
      title: listing?.name,
      description: listing?.description
        ? cleanText(listing.description)
        : this.findDescription($),
      price,
      currency: offers?.priceSpecification?.priceCurrency,
      price_per_sqm: pricePerSqm > 0 ? pricePerSqm : undefined,
      levies: overview.levies,
      rates_and_taxes: overview.rates_and_taxes,
      no_transfer_duty: overview.no_transfer_duty,
      property_type: about?.["@type"] ?? overview.type_of_property,
      bedrooms:
        toNumber(about?.numberOfBedrooms) ??
        matchNumber(allText, /(\d+)\s*(?:bed|bedroom)/i),
      bathrooms:
        toNumber(about?.numberOfBathroomsTotal) ??
        matchNumber(allText, /(\d+)\s*(?:bath|bathroom)/i),
      parking: matchNumber(allText, /(\d+)\s*(?:parking|garage)/i),
      floor_size: floorSize,
      erf_size: overview.erf_size,
      lifestyle: overview.lifestyle,
      pets_allowed: petsAllowed(about?.petsAllowed) ?? overview.pets_allowed,
      address: address?.streetAddress,
      suburb: address?.addressLocality ?? fromUrl.suburb,
      city: fromUrl.city,
      province: address?.addressRegion ?? fromUrl.province,
      latitude: toNumber(about?.latitude),
      longitude: toNumber(about?.longitude),
      listing_date:
        overview.listing_date ??
        (listing?.datePosted !== undefined
          ? String(listing.datePosted)
          : undefined),
      image_url: Array.isArray(image) ? image[0] : image,
      agent: this.extractAgent($, listing),
      amenities: this.extractAmenities(allText),
      rooms: this.extractRooms($),
      external_features: this.extractExternalFeatures($),
      points_of_interest: this.extractPointsOfInterest($),
    };

    return record;
  }

  /**
   * Listing URLs look like
   * /for-sale/<suburb>/<city>/<province>/<areaId>/<listingId>.
   */
  parseListingUrl(url: string): UrlLocation {
    let segments: string[];
    try {
      segments = new URL(url, BASE_URL).pathname.split("/").filter(Boolean);
    } catch {
      return {};
    }

    if (segments[0] !== "for-sale" && segments[0] !== "to-rent") {
      return {};
    }

    const listingId = segments[5];
    return {
      suburb: segments[1] ? titleCase(segments[1]) : undefined,
      city: segments[2] ? titleCase(segments[2]) : undefined,
      province: segments[3] ? titleCase(segments[3]) : undefined,
      listingId: listingId && /^\d+$/.test(listingId) ? listingId : undefined,
    };
  }

  private extractFromJsonLd($: CheerioAPI): JsonLdListing | undefined {
    const scripts = $('script[type="application/ld+json"]').toArray();

    for (const script of scripts) {
      let data: unknown;
      try {
        data = JSON.parse($(script).text());
      } catch (error) {
        console.warn(
          "⚠️  Error parsing JSON-LD:",
          error instanceof Error ? error.message : String(error)
        );
        continue;
      }

      for (const item of graphItems(data)) {
        const parsed = jsonLdListingSchema.safeParse(item);
        if (parsed.success) {
          return parsed.data;
        }
      }
    }

    return undefined;
  }

  private extractOverview($: CheerioAPI): Record<string, string> {
    const overview: Record<string, string> = {};

    $(".p24_propertyOverviewRow").each((_index, row) => {
      const key = cleanText($(row).find(".p24_propertyOverviewKey").text());
      const value = cleanText($(row).find(".p24_info").text());
      if (key && value) {
        overview[normalizeKey(key)] = value;
      }
    });

    return overview;
  }

  /** Overview rows that sit under the panel headed `heading`. */
  private panelRows($: CheerioAPI, heading: string) {
    return $(".p24_propertyOverview")
      .filter(
        (_index, panel) =>
          normalizeKey($(panel).find(".panel-heading").text()) === heading
      )
      .find(".p24_propertyOverviewRow");
  }

  private extractRooms($: CheerioAPI): Record<string, RoomInfo> | undefined {
    const rooms: Record<string, RoomInfo> = {};

    this.panelRows($, "rooms").each((_index, row) => {
      const key = cleanText($(row).find(".p24_propertyOverviewKey").text());
      const count = cleanText($(row).find(".p24_info").first().text());
      const details = $(row)
        .find(".p24_featureDetails")
        .toArray()
        .map((detail) => cleanText($(detail).text()))
        .filter(Boolean);
      if (key && count) {
        rooms[normalizeKey(key)] = { count, details };
      }
    });

    return Object.keys(rooms).length > 0 ? rooms : undefined;
  }

  private extractExternalFeatures(
    $: CheerioAPI
  ): Record<string, string> | undefined {
    const features: Record<string, string> = {};

    this.panelRows($, "external_features").each((_index, row) => {
      const key = cleanText($(row).find(".p24_propertyOverviewKey").text());
      const value = cleanText($(row).find(".p24_info").text());
      if (key && value) {
        features[normalizeKey(key)] = value;
      }
    });

    return Object.keys(features).length > 0 ? features : undefined;
  }

  private extractPointsOfInterest(
    $: CheerioAPI
  ): Record<string, PointOfInterest[]> | undefined {
    const poi: Record<string, PointOfInterest[]> = {};

    $(".js_P24_POICategory").each((_index, category) => {
      const title = normalizeKey(
        $(category).find(".p24_poiCategoryTitle").text()
      );
      if (!title) return;

      const places = $(category)
        .find(".p24_poiPlace")
        .toArray()
        .map((place) => ({
          name: cleanText($(place).find(".p24_poiName").text()),
          distance: cleanText($(place).find(".p24_poiDistance").text()),
        }))
        .filter((place) => place.name !== "");
      if (places.length > 0) {
        poi[title] = [...(poi[title] ?? []), ...places];
      }
    });

    return Object.keys(poi).length > 0 ? poi : undefined;
  }

  private findPrice(allText: string): number | undefined {
    for (const match of allText.matchAll(
      /R\s?(\d{1,3}(?:[ \u00a0,]\d{3})+|\d{6,})/g
    )) {
      const cleanPrice = (match[1] ?? "").replace(/[\s,]/g, "");
      if (/^\d{6,}$/.test(cleanPrice)) {
        return parseInt(cleanPrice, 10);
      }
    }
    return undefined;
  }

  private findDescription($: CheerioAPI): string | undefined {
    for (const selector of DESCRIPTION_SELECTORS) {
      const element = $(selector).first();
      if (element.length === 0) continue;

      const descText = cleanText(element.text());
      if (descText.length > 50) {
        return descText.slice(0, 500);
      }
    }
    return undefined;
  }

  private extractAgent(
    $: CheerioAPI,
    listing: JsonLdListing | undefined
  ): AgentInfo | undefined {
    const offeredBy = listing?.offers?.offeredBy;
    if (offeredBy?.name) {
      return {
        name: offeredBy.name,
        agent_url: offeredBy.url,
        agency: offeredBy.worksFor?.name,
        agency_url: offeredBy.worksFor?.url,
      };
    }

    const agentSection = $("div.p24_agentDetails").first();
    if (agentSection.length === 0) return undefined;

    const name = agentSection
      .text()
      .split("\n")
      .map((line) => line.trim())
      .find(
        (line) =>
          line.length > 3 &&
          !/^\d+$/.test(line) &&
          !line.toLowerCase().includes("show")
      );
    return name ? { name } : undefined;
  }

  private extractAmenities(
    allText: string
  ): Partial<Record<Amenity, boolean>> {
    const lowerText = allText.toLowerCase();
    const found: Partial<Record<Amenity, boolean>> = {};

    for (const [amenity, keywords] of amenityEntries()) {
      if (keywords.some((keyword) => lowerText.includes(keyword))) {
        found[amenity] = true;
      }
    }

    return found;
  }
}

function amenityEntries(): [Amenity, string[]][] {
  const amenities = Object.keys(AMENITY_KEYWORDS).filter(isAmenity);
  return amenities.map((amenity) => [amenity, AMENITY_KEYWORDS[amenity]]);
}

function isAmenity(key: string): key is Amenity {
  return Object.prototype.hasOwnProperty.call(AMENITY_KEYWORDS, key);
}

function graphItems(data: unknown): unknown[] {
  if (Array.isArray(data)) return data;
  if (typeof data === "object" && data !== null && "@graph" in data) {
    const graph = data["@graph"];
    return Array.isArray(graph) ? graph : [];
  }
  return [data];
}

function toNumber(value: string | number | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const num = extractNumericValue(value);
  return num !== 0 || String(value).trim() === "0" ? num : undefined;
}

function leadingNumber(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const match = value.match(/\d[\d\s,]*(?:\.\d+)?/);
  return match ? parseFloat(match[0].replace(/[\s,]/g, "")) : undefined;
}

function matchNumber(text: string, pattern: RegExp): number | undefined {
  const match = text.match(pattern);
  return match ? parseInt(match[1] ?? "0", 10) : undefined;
}

function petsAllowed(value: boolean | string | undefined): string | undefined {
  if (typeof value === "boolean") return value ? "Yes" : "No";
  return value;
}

export function cleanText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function normalizeKey(key: string): string {
  return key
    .toLowerCase()
    .replace(/m²/g, "m2")
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

export function titleCase(slug: string): string {
  return slug
    .split("-")
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}
