import type { LocalDeal, LocalEvent } from "./types.js";

// Placeholder listings until an events or deals feed is wired in. The
// lists are fixed so repeated requests get identical results.

export function sampleEvents(location: string): LocalEvent[] {
  const place = location.trim() || "the city";

  return [
    { name: "Local Food Festival", date: "This weekend", location: place },
    { name: "Art Gallery Opening", date: "Next Friday", location: place },
    { name: "Cultural Performance", date: "Every evening", location: place },
  ];
}

export function sampleDeals(): LocalDeal[] {
  return [
    {
      description: "10% off museum admissions",
      discount: "10%",
      expires: "End of month",
    },
    {
      description: "Free walking tour booking",
      discount: "100%",
      expires: "Limited time",
    },
    {
      description: "Happy hour at local restaurants",
      discount: "20%",
      expires: "Daily 4-6 PM",
    },
  ];
}
