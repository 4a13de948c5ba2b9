import { DEFAULT_FINANCE_CONFIG } from "./config";
import {
  calculateBondAmount,
  calculateMonthlyCosts,
  calculateOnceOffCosts,
  DEPOSIT_RATE,
  extractNumericValue,
} from "./finance";
import type {
  Amenity,
  FinanceConfig,
  PointOfInterest,
  PropertyNote,
  PropertyRecord,
  RoomInfo,
} from "./types";
import { formatTimestamp } from "./utils/dates";

export interface NoteOptions {
  config?: FinanceConfig;
  now?: Date;
}

const RAND = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

// places shown per points-of-interest category
const POI_LIMIT = 5;

/**
 * Whole Rand with thousands separators, e.g. "R1,210,000". Fractions are
 * truncated. Strings that hold no amount are returned as they are.
 */
export function formatCurrency(amount: unknown): string {
  if (!amount) return "R0";

  if (typeof amount === "string") {
    const value = extractNumericValue(amount);
    return value === 0 ? amount : `R${RAND.format(Math.trunc(value))}`;
  }

  if (typeof amount === "number") {
    return Number.isFinite(amount)
      ? `R${RAND.format(Math.trunc(amount))}`
      : "R0";
  }

  return String(amount);
}

/** Single-line value that is safe inside a double-quoted YAML scalar. */
export function safeString(value: unknown): string {
  if (value === null || value === undefined || value === "") return "";
  return String(value)
    .replace(/\\/g, "\\\\")
    .replace(/"/g, "'")
    .replace(/\r?\n/g, " ")
    .trim();
}

function quoted(value: unknown): string {
  return `"${safeString(value)}"`;
}

export function generateFilename(record: PropertyRecord): string {
  let filename = (record.title ?? "").replace(/[^a-zA-Z0-9\s]/g, "");
  filename = filename.trim().replace(/\s+/g, "_").slice(0, 50) || "Property";

  if (record.listing_id) {
    filename = `${filename}_${record.listing_id}`;
  }

  return `${filename}.md`;
}

export function generateAmenitiesFrontmatter(
  amenities: Partial<Record<Amenity, boolean>> | undefined
): string {
  const present = Object.entries(amenities ?? {})
    .filter(([, isPresent]) => isPresent)
    .map(([amenity]) => amenity)
    .sort();

  if (present.length === 0) return "";
  return ["amenities:", ...present.map((a) => `  - ${a}`)].join("\n");
}

function humanize(key: string): string {
  return key
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

function row(label: string, value: string): string {
  return `| **${label}** | ${value} |`;
}

function orNA(value: string | number | undefined): string {
  return value === undefined || value === "" ? "N/A" : String(value);
}

function percent(rate: number): string {
  return `${(rate * 100).toFixed(2)}%`;
}

function roomLayout(rooms: Record<string, RoomInfo> | undefined): string[] {
  const lines = Object.entries(rooms ?? {}).map(([room, info]) => {
    const details =
      info.details.length > 0 ? ` (${info.details.join(", ")})` : "";
    return `- **${humanize(room)}**: ${info.count}${details}`;
  });
  return lines.length > 0 ? ["### Room Layout", "", ...lines, ""] : [];
}

function pointsOfInterest(
  poi: Record<string, PointOfInterest[]> | undefined
): string[] {
  return Object.entries(poi ?? {})
    .filter(([, places]) => places.length > 0)
    .flatMap(([category, places]) => {
      const lines = places
        .slice(0, POI_LIMIT)
        .map((place) =>
          place.distance
            ? `- **${place.name}** - ${place.distance}`
            : `- **${place.name}**`
        );
      if (places.length > POI_LIMIT) {
        lines.push(`- *...and ${places.length - POI_LIMIT} more*`);
      }
      return ["", `### ${humanize(category)}`, "", ...lines];
    });
}

export function generateNote(
  record: PropertyRecord,
  options: NoteOptions = {}
): PropertyNote {
  const config = options.config ?? DEFAULT_FINANCE_CONFIG;
  const timestamp = formatTimestamp(options.now ?? new Date());

  const title = record.title || "Unknown Property";
  const price = extractNumericValue(record.price);
  const deposit = price * DEPOSIT_RATE;
  const bondAmount = calculateBondAmount(price);

  const onceOff = calculateOnceOffCosts(price, config);
  const monthly = calculateMonthlyCosts(
    {
      bondAmount,
      levies: record.levies,
      ratesTaxes: record.rates_and_taxes,
      price,
    },
    config
  );

  const location = {
    province: record.province || "Unknown",
    city: record.city || "Unknown",
    suburb: record.suburb || "Unknown",
  };

  const frontmatter = [
    "---",
    `date: ${timestamp}`,
    "tags:",
    "  - property",
    "  - portfolio",
    "cssclasses:",
    "  - page-manila",
    "  - pen-black",
    `title: ${quoted(title)}`,
    `property_type: ${quoted(record.property_type)}`,
    "status: interested",
    `source: ${quoted(record.source)}`,
    `province: ${quoted(record.province)}`,
    `city: ${quoted(record.city)}`,
    `suburb: ${quoted(record.suburb)}`,
    `bedrooms: ${record.bedrooms ?? "null"}`,
    `bathrooms: ${record.bathrooms ?? "null"}`,
    `price: ${price}`,
    `monthly_cost: ${Math.trunc(monthly.total)}`,
    generateAmenitiesFrontmatter(record.amenities),
    "---",
  ].filter((line) => line !== "");

  const monthlyRows = [
    row("Bond Payment", formatCurrency(monthly.bondPayment)),
    row("Levies", formatCurrency(monthly.levies)),
    row("Rates & Taxes", formatCurrency(monthly.ratesTaxes)),
  ];
  if (config.monthlyItems.insurance) {
    monthlyRows.push(row("Insurance", formatCurrency(monthly.insurance)));
  }
  if (config.monthlyItems.maintenance) {
    monthlyRows.push(row("Maintenance", formatCurrency(monthly.maintenance)));
  }
  if (config.monthlyItems.utilities) {
    monthlyRows.push(row("Utilities", formatCurrency(monthly.utilities)));
  }
  if (config.monthlyItems.security) {
    monthlyRows.push(row("Security", formatCurrency(monthly.security)));
  }
  monthlyRows.push(row("Total Monthly", formatCurrency(monthly.total)));

  const body = [
    `# ${title}`,
    "",
    "## Location & Basic Info",
    "",
    "| Field | Value |",
    "|-------|-------|",
    row("Address", orNA(record.address)),
    row("Suburb", `[[${record.suburb || "N/A"}]]`),
    row("City", orNA(record.city)),
    row("Province", orNA(record.province)),
    row("Property Type", orNA(record.property_type)),
    row("Lifestyle", orNA(record.lifestyle)),
    row("Listing ID", orNA(record.listing_id)),
    row("Listed Date", orNA(record.listing_date)),
    "",
    "## Financial Analysis",
    "",
    "### Purchase Costs",
    "",
    "| Item | Amount |",
    "|------|--------|",
    row("Purchase Price", formatCurrency(price)),
    row(`Deposit (${DEPOSIT_RATE * 100}%)`, formatCurrency(onceOff.deposit)),
    row("Transfer Duty", formatCurrency(onceOff.transferDuty)),
    row("Bond Registration", formatCurrency(onceOff.bondRegistration)),
    row("Transfer Costs", formatCurrency(onceOff.transferCosts)),
    row("Attorney Fees", formatCurrency(onceOff.attorneyFees)),
    row("Bond Origination", formatCurrency(onceOff.bondOrigination)),
    row("Moving Costs", formatCurrency(onceOff.movingCosts)),
    row("Security Setup", formatCurrency(onceOff.securitySetup)),
    row("Immediate Repairs", formatCurrency(onceOff.immediateRepairs)),
    row("Total Once-Off Costs", formatCurrency(onceOff.total)),
    row("Total Purchase Cost", formatCurrency(onceOff.grandTotal)),
    "",
    "### Bond Calculations",
    "",
    "| Item | Amount |",
    "|------|--------|",
    row(`Deposit (${DEPOSIT_RATE * 100}%)`, formatCurrency(deposit)),
    row("Bond Amount", formatCurrency(bondAmount)),
    row("Interest Rate", percent(config.interestRate)),
    row("Bond Term", `${config.bondTermYears} years`),
    row("Monthly Payment", formatCurrency(monthly.bondPayment)),
    "",
    "### Monthly Costs",
    "",
    "| Item | Amount |",
    "|------|--------|",
    ...monthlyRows,
    "",
    "### Investment Metrics",
    "",
    "| Metric | Value |",
    "|--------|-------|",
    row(
      "Price per m²",
      record.price_per_sqm ? formatCurrency(record.price_per_sqm) : "N/A"
    ),
    row("Transfer Duty Exempt", orNA(record.no_transfer_duty)),
    row("Break-even Rental", formatCurrency(monthly.total)),
    "",
    "## Property Features",
    "",
    ...roomLayout(record.rooms),
    "### Property Specifications",
    "",
    "| Specification | Value |",
    "|---------------|-------|",
    row("Bedrooms", orNA(record.bedrooms)),
    row("Bathrooms", orNA(record.bathrooms)),
    row("Parking", orNA(record.parking)),
    row("Floor Size", `${orNA(record.floor_size)} m²`),
    row("Erf Size", orNA(record.erf_size)),
    row("Levies", formatCurrency(monthly.levies)),
    row("Rates & Taxes", formatCurrency(monthly.ratesTaxes)),
    row("Pets Allowed", orNA(record.pets_allowed)),
  ];

  const features = Object.entries(record.amenities ?? {})
    .filter(([, isPresent]) => isPresent)
    .map(([amenity]) => `- ${humanize(amenity)}`);
  if (features.length > 0) {
    body.push("", "### Key Features", "", ...features);
  }

  const external = Object.entries(record.external_features ?? {}).map(
    ([feature, detail]) => `- **${humanize(feature)}**: ${detail}`
  );
  if (external.length > 0) {
    body.push("", "### External Features", "", ...external);
  }

  if (record.description) {
    body.push("", "## Description", "", record.description);
  }

  const poiLines = pointsOfInterest(record.points_of_interest);
  if (poiLines.length > 0) {
    body.push("", "## Points of Interest", ...poiLines);
  }

  const agent = record.agent ?? {};
  body.push(
    "",
    "## Agent Information",
    "",
    "| Field | Value |",
    "|-------|-------|",
    row("Agent Name", orNA(agent.name)),
    row("Agency", orNA(agent.agency)),
    row(
      "Agent Profile",
      `[${agent.name || "View Profile"}](${agent.agent_url ?? ""})`
    ),
    row(
      "Agency Profile",
      `[${agent.agency || "View Agency"}](${agent.agency_url ?? ""})`
    ),
    "",
    "## Viewing & Assessment",
    "",
    "### Viewing Details",
    "- **Viewing Date**: ",
    "- **Viewing Time**: ",
    "- **Viewing Notes**: ",
    "",
    "### Property Assessment",
    "- **Overall Condition**: ",
    "- **Score (1-10)**: ",
    "- **Pros**: ",
    "  - ",
    "- **Cons**: ",
    "  - ",
    "",
    "### Decision",
    "- **Status**: ",
    "- **Decision**: ",
    "- **Reason**: ",
    "- **Next Steps**: ",
    "",
    "## Documents & Links",
    "",
    "### Required Documents",
    "- [ ] Title Deed",
    "- [ ] Rates Certificate",
    "- [ ] Electrical Certificate",
    "- [ ] Plumbing Certificate",
    "- [ ] Building Plans",
    "- [ ] Body Corporate Rules (if applicable)",
    "",
    "### Links",
    `- **Property Listing**: [View on Property24](${record.property_url})`,
    `- **Property Images**: [View Images](${record.image_url ?? ""})`,
    "",
    "---",
    `*Last updated: ${timestamp}*  `,
    `*Scraped from: ${record.source} on ${record.scraped_date}*`,
    ""
  );

  return {
    filename: generateFilename(record),
    content: `${frontmatter.join("\n")}\n\n${body.join("\n")}`,
    location,
    metadata: {
      price,
      bedrooms: record.bedrooms,
      bathrooms: record.bathrooms,
      monthly_cost: Math.trunc(monthly.total),
    },
  };
}
