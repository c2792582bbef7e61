import type { CandidateRecord } from "./types.js";

// Generic places nearly every destination has; used when neither the
// knowledge base nor live sources produce anything.
export function fallbackRecords(location: string): CandidateRecord[] {
  const place = location.trim() || "the city";

  return [
    {
      name: "City Center",
      description: `Main city center of ${place} with shops and restaurants`,
      attributes: {
        category: "district",
        rating: 4.0,
        priceRange: "Free",
        openingHours: "24/7",
        address: place,
        whyRecommended: "Heart of the city",
      },
    },
    {
      name: "Central Museum",
      description: `Main museum of ${place} covering local history`,
      attributes: {
        category: "museum",
        rating: 4.2,
        priceRange: "$10-15",
        openingHours: "10:00-17:00",
        address: place,
        whyRecommended: "Learn about local culture and history",
      },
    },
    {
      name: "Historic District",
      description: `Old part of ${place} with historic buildings`,
      attributes: {
        category: "historical",
        rating: 4.1,
        priceRange: "Free",
        openingHours: "24/7",
        address: place,
        whyRecommended: "Beautiful historic architecture",
      },
    },
    {
      name: "Local Market",
      description: `Traditional market in ${place} with local products`,
      attributes: {
        category: "market",
        rating: 4.3,
        priceRange: "$5-20",
        openingHours: "8:00-18:00",
        address: place,
        whyRecommended: "Authentic local experience",
      },
    },
  ];
}
