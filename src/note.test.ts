// src/note.test.ts
import { DEFAULT_FINANCE_CONFIG } from "./config";
import {
  formatCurrency,
  generateAmenitiesFrontmatter,
  generateFilename,
  generateNote,
  safeString,
} from "./note";
import type { PropertyRecord } from "./types";

const NOW = new Date(2025, 2, 14, 9, 5, 7);

function makeRecord(): PropertyRecord {
  return {
    property_url:
      "https://www.property24.com/for-sale/zonnebloem/cape-town/western-cape/10166/114098915",
    source: "Property24",
    scraped_date: "2025-03-14 09:00:00",
    listing_id: "114098915",
    title: "2 Bedroom Apartment in Zonnebloem",
    price: 1500000,
    levies: "R 1 850",
    rates_and_taxes: "R 950",
    property_type: "Apartment",
    bedrooms: 2,
    bathrooms: 1,
    floor_size: 68,
    suburb: "Zonnebloem",
    city: "Cape Town",
    province: "Western Cape",
    agent: {
      name: "Jane Agent",
      agency: "Test Realty",
      agent_url: "https://www.property24.com/agents/jane-agent",
      agency_url: "https://www.property24.com/agencies/test-realty",
    },
    amenities: { security: true, pool: true, gym: false },
  };
}

describe("formatCurrency", () => {
  test("formats whole Rand with thousands separators", () => {
    expect(formatCurrency(1210000)).toBe("R1,210,000");
    expect(formatCurrency(9137.96)).toBe("R9,137");
    expect(formatCurrency(850)).toBe("R850");
  });

  test("parses amount strings", () => {
    expect(formatCurrency("R 27 000")).toBe("R27,000");
    expect(formatCurrency("1,500,000")).toBe("R1,500,000");
  });

  test("keeps text that holds no amount", () => {
    expect(formatCurrency("POA")).toBe("POA");
  });

  test("empty values are R0", () => {
    expect(formatCurrency(0)).toBe("R0");
    expect(formatCurrency(null)).toBe("R0");
    expect(formatCurrency(undefined)).toBe("R0");
    expect(formatCurrency("")).toBe("R0");
    expect(formatCurrency(Number.NaN)).toBe("R0");
  });
});

describe("safeString", () => {
  test("replaces double quotes and newlines", () => {
    expect(safeString('He said "hi"\nbye ')).toBe("He said 'hi' bye");
    expect(safeString(undefined)).toBe("");
    expect(safeString(3)).toBe("3");
  });

  test("escapes backslashes", () => {
    expect(safeString("Unit 4\\n Block B")).toBe("Unit 4\\\\n Block B");
  });
});

describe("generateFilename", () => {
  test("cleans the title and appends the listing id", () => {
    expect(
      generateFilename({
        ...makeRecord(),
        title: "Stunning 3-Bed Home! (Sea Views)",
        listing_id: "123",
      })
    ).toBe("Stunning_3Bed_Home_Sea_Views_123.md");
  });

  test("limits the title part to 50 characters", () => {
    const filename = generateFilename({
      ...makeRecord(),
      title: "A".repeat(60),
      listing_id: undefined,
    });
    expect(filename).toBe(`${"A".repeat(50)}.md`);
  });

  test("falls back to Property", () => {
    expect(
      generateFilename({ ...makeRecord(), title: undefined, listing_id: "9" })
    ).toBe("Property_9.md");
  });

  test("falls back to Property when nothing of the title survives", () => {
    expect(
      generateFilename({ ...makeRecord(), title: "Café Ñ", listing_id: "9" })
    ).toBe("Caf_9.md");
    expect(
      generateFilename({ ...makeRecord(), title: "Élan Ô", listing_id: "9" })
    ).toBe("lan_9.md");
    expect(
      generateFilename({ ...makeRecord(), title: "ÉÔ ✨", listing_id: "9" })
    ).toBe("Property_9.md");
    expect(
      generateFilename({ ...makeRecord(), title: "✨", listing_id: undefined })
    ).toBe("Property.md");
  });
});

describe("generateAmenitiesFrontmatter", () => {
  test("lists present amenities in order", () => {
    expect(
      generateAmenitiesFrontmatter({ view: true, pool: true, gym: false })
    ).toBe("amenities:\n  - pool\n  - view");
  });

  test("is empty without amenities", () => {
    expect(generateAmenitiesFrontmatter(undefined)).toBe("");
    expect(generateAmenitiesFrontmatter({ gym: false })).toBe("");
  });
});

describe("generateNote", () => {
  test("starts with dataview frontmatter", () => {
    const note = generateNote(makeRecord(), { now: NOW });

    const frontmatter = [
      "---",
      "date: 2025-03-14 09:05:07",
      "tags:",
      "  - property",
      "  - portfolio",
      "cssclasses:",
      "  - page-manila",
      "  - pen-black",
      'title: "2 Bedroom Apartment in Zonnebloem"',
      'property_type: "Apartment"',
      "status: interested",
      'source: "Property24"',
      'province: "Western Cape"',
      'city: "Cape Town"',
      'suburb: "Zonnebloem"',
      "bedrooms: 2",
      "bathrooms: 1",
      "price: 1500000",
      "monthly_cost: 19893",
      "amenities:",
      "  - pool",
      "  - security",
      "---",
      "",
      "# 2 Bedroom Apartment in Zonnebloem",
    ].join("\n");
    expect(note.content.startsWith(frontmatter)).toBe(true);
  });

  test("renders the cost tables", () => {
    const lines = generateNote(makeRecord(), { now: NOW }).content.split("\n");

    expect(lines).toContain("| **Purchase Price** | R1,500,000 |");
    expect(lines).toContain("| **Deposit (10%)** | R150,000 |");
    expect(lines).toContain("| **Transfer Duty** | R8,700 |");
    expect(lines).toContain("| **Bond Registration** | R13,500 |");
    expect(lines).toContain("| **Total Once-Off Costs** | R226,950 |");
    expect(lines).toContain("| **Total Purchase Cost** | R1,726,950 |");
    expect(lines).toContain("| **Bond Amount** | R1,350,000 |");
    expect(lines).toContain("| **Interest Rate** | 10.75% |");
    expect(lines).toContain("| **Bond Term** | 20 years |");
    expect(lines).toContain("| **Bond Payment** | R13,705 |");
    expect(lines).toContain("| **Levies** | R1,850 |");
    expect(lines).toContain("| **Rates & Taxes** | R950 |");
    expect(lines).toContain("| **Utilities** | R1,500 |");
    expect(lines).toContain("| **Security** | R300 |");
    expect(lines).toContain("| **Total Monthly** | R19,893 |");
    expect(lines).toContain("| **Break-even Rental** | R19,893 |");
  });

  test("renders location, features and agent", () => {
    const lines = generateNote(makeRecord(), { now: NOW }).content.split("\n");

    expect(lines).toContain("| **Suburb** | [[Zonnebloem]] |");
    expect(lines).toContain("| **Floor Size** | 68 m² |");
    expect(lines).toContain("| **Erf Size** | N/A |");
    expect(lines).toContain("- Pool");
    expect(lines).toContain("- Security");
    expect(lines).not.toContain("- Gym");
    expect(lines).toContain(
      "| **Agent Profile** | [Jane Agent](https://www.property24.com/agents/jane-agent) |"
    );
    expect(lines).toContain("*Scraped from: Property24 on 2025-03-14 09:00:00*");
  });

  test("returns filename, location and metadata", () => {
    const note = generateNote(makeRecord(), { now: NOW });

    expect(note.filename).toBe("2_Bedroom_Apartment_in_Zonnebloem_114098915.md");
    expect(note.location).toEqual({
      province: "Western Cape",
      city: "Cape Town",
      suburb: "Zonnebloem",
    });
    expect(note.metadata).toEqual({
      price: 1500000,
      bedrooms: 2,
      bathrooms: 1,
      monthly_cost: 19893,
    });
  });

  test("leaves switched-off monthly items out of the table", () => {
    const config = {
      ...DEFAULT_FINANCE_CONFIG,
      interestRate: 0.1175,
      bondTermYears: 30,
      monthlyItems: {
        ...DEFAULT_FINANCE_CONFIG.monthlyItems,
        security: false,
      },
    };
    const lines = generateNote(makeRecord(), { now: NOW, config }).content.split(
      "\n"
    );

    expect(lines).not.toContain("| **Security** | R300 |");
    expect(lines).toContain("| **Security Setup** | R7,500 |");
    expect(lines).toContain("| **Interest Rate** | 11.75% |");
    expect(lines).toContain("| **Bond Term** | 30 years |");
    expect(lines).toContain("| **Bond Payment** | R13,627 |");
  });

  test("quotes frontmatter values that would break YAML", () => {
    const lines = generateNote(
      {
        ...makeRecord(),
        title: 'Unit 4\\n "Penthouse"',
        property_type: "Apartment: Loft",
        suburb: "- Sea Point",
        city: "# Cape Town",
      },
      { now: NOW }
    ).content.split("\n");

    expect(lines).toContain("title: \"Unit 4\\\\n 'Penthouse'\"");
    expect(lines).toContain('property_type: "Apartment: Loft"');
    expect(lines).toContain('suburb: "- Sea Point"');
    expect(lines).toContain('city: "# Cape Town"');
  });

  test("renders room layout, external features and points of interest", () => {
    const record: PropertyRecord = {
      ...makeRecord(),
      rooms: {
        bedrooms: {
          count: "2",
          details: ["Main en Suite", "Built-in Cupboards"],
        },
        kitchen: { count: "1", details: [] },
      },
      external_features: { garden: "Landscaped", pool: "Yes" },
      points_of_interest: {
        schools: [
          { name: "School A", distance: "0.5 km" },
          { name: "School B", distance: "0.7 km" },
          { name: "School C", distance: "1.1 km" },
          { name: "School D", distance: "1.4 km" },
          { name: "School E", distance: "2.0 km" },
          { name: "School F", distance: "2.3 km" },
          { name: "School G", distance: "2.9 km" },
        ],
        food_drink: [{ name: "Corner Cafe", distance: "" }],
        transport: [],
      },
    };
    const content = generateNote(record, { now: NOW }).content;

    expect(content).toContain(
      [
        "## Property Features",
        "",
        "### Room Layout",
        "",
        "- **Bedrooms**: 2 (Main en Suite, Built-in Cupboards)",
        "- **Kitchen**: 1",
        "",
        "### Property Specifications",
      ].join("\n")
    );
    expect(content).toContain(
      [
        "### External Features",
        "",
        "- **Garden**: Landscaped",
        "- **Pool**: Yes",
      ].join("\n")
    );
    expect(content).toContain(
      [
        "## Points of Interest",
        "",
        "### Schools",
        "",
        "- **School A** - 0.5 km",
        "- **School B** - 0.7 km",
        "- **School C** - 1.1 km",
        "- **School D** - 1.4 km",
        "- **School E** - 2.0 km",
        "- *...and 2 more*",
        "",
        "### Food Drink",
        "",
        "- **Corner Cafe**",
        "",
        "## Agent Information",
      ].join("\n")
    );
    expect(content).not.toContain("School F");
    expect(content).not.toContain("### Transport");
  });

  test("leaves out empty feature sections", () => {
    const content = generateNote(makeRecord(), { now: NOW }).content;

    expect(content).not.toContain("### Room Layout");
    expect(content).not.toContain("### External Features");
    expect(content).not.toContain("## Points of Interest");
  });

  test("renders a note for a listing with almost no data", () => {
    const note = generateNote(
      {
        property_url: "https://www.property24.com/for-sale/unknown",
        source: "Property24",
        scraped_date: "2025-03-14 09:00:00",
      },
      { now: NOW }
    );
    const lines = note.content.split("\n");

    expect(note.filename).toBe("Property.md");
    expect(note.location).toEqual({
      province: "Unknown",
      city: "Unknown",
      suburb: "Unknown",
    });
    expect(lines).toContain("bedrooms: null");
    expect(lines).toContain('property_type: ""');
    expect(lines).toContain("# Unknown Property");
    expect(lines).toContain("| **Purchase Price** | R0 |");
    expect(lines).toContain("| **Total Monthly** | R1,800 |");
    expect(lines).toContain("| **Address** | N/A |");
    expect(note.metadata.monthly_cost).toBe(1800);
  });
});
