import { describe, it } from "mocha";
import { expect } from "chai";

import {
  InvalidFilterError,
  accepts,
  allOf,
  blacklist,
  category,
  country,
  countrySet,
  describePredicate,
  loadAtMost,
  loadRange,
  not,
  protocol,
  whitelist,
  type Predicate,
} from "../src/filters/predicates.js";
import { ServerCatalog } from "../src/servers/catalog.js";
import { domainsOf, server } from "./helpers/servers.js";

function sampleServers() {
  return [
    server("us1", "US", 50, { categories: ["standard", "p2p"], features: { openvpnTcp: true, openvpnUdp: true } }),
    server("us2", "US", 10, { features: { openvpnTcp: true, wireguardUdp: true } }),
    server("be1", "BE", 5, { features: { openvpnXorTcp: true } }),
    server("de1", "DE", 30, { categories: ["double"], features: { openvpnXorUdp: true, ikev2: true } }),
    server("fr1", "FR", 0, { categories: ["tor"] }),
    server("nl1", "NL", 100, { categories: ["obfuscated"], features: { socks: true, proxySsl: true } }),
  ];
}

const PREDICATES: Array<[string, Predicate]> = [
  ["country", country("us")],
  ["countrySet", countrySet(["BE", "de"])],
  ["protocol", protocol("tcp")],
  ["category", category("p2p")],
  ["loadAtMost", loadAtMost(30)],
  ["loadRange", loadRange(5, 50)],
  ["whitelist", whitelist(["us1", "fr1"])],
  ["blacklist", blacklist(["us1", "fr1"])],
  ["not", not(country("US"))],
  ["all", allOf([protocol("tcp"), loadAtMost(20)])],
];

describe("filters predicates", () => {
  for (const [name, predicate] of PREDICATES) {
    it(`applies ${name} idempotently`, () => {
      const catalog = new ServerCatalog(sampleServers());
      catalog.apply(predicate);
      const once = domainsOf(catalog.toArray());

      catalog.apply(predicate);

      expect(domainsOf(catalog.toArray())).to.deep.equal(once);
    });

    it(`partitions the catalogue with ${name} and its negation`, () => {
      const kept = new ServerCatalog(sampleServers());
      const dropped = new ServerCatalog(sampleServers());

      kept.apply(predicate);
      dropped.apply(not(predicate));

      const keptDomains = domainsOf(kept.toArray());
      const droppedDomains = domainsOf(dropped.toArray());
      expect(keptDomains.filter((domain) => droppedDomains.includes(domain))).to.deep.equal([]);
      expect([...keptDomains, ...droppedDomains].sort()).to.deep.equal(["be1", "de1", "fr1", "nl1", "us1", "us2"]);
    });
  }

  it("matches countries case-insensitively at construction", () => {
    const catalog = new ServerCatalog(sampleServers());

    catalog.apply(country(" us "));

    expect(domainsOf(catalog.toArray())).to.deep.equal(["us1", "us2"]);
  });

  it("maps each protocol name onto its feature flag", () => {
    const expectations: Array<[Parameters<typeof protocol>[0], string[]]> = [
      ["tcp", ["us1", "us2"]],
      ["udp", ["us1"]],
      ["tcp_xor", ["be1"]],
      ["udp_xor", ["de1"]],
      ["wg_udp", ["us2"]],
      ["ikev2", ["de1"]],
      ["socks", ["nl1"]],
      ["sslproxy", ["nl1"]],
      ["pptp", []],
    ];
    for (const [name, domains] of expectations) {
      const catalog = new ServerCatalog(sampleServers());
      catalog.apply(protocol(name));
      expect(domainsOf(catalog.toArray()), name).to.deep.equal(domains);
    }
  });

  it("keeps loads at or below the threshold for loadAtMost", () => {
    const records = sampleServers();
    const accepted = records.filter((record) => accepts(loadAtMost(30), record));

    expect(domainsOf(accepted)).to.deep.equal(["us2", "be1", "de1", "fr1"]);
  });

  it("excludes both bounds for loadRange", () => {
    const records = [server("lo", "US", 10), server("mid", "US", 11), server("top", "US", 49), server("hi", "US", 50)];
    const accepted = records.filter((record) => accepts(loadRange(10, 50), record));

    expect(domainsOf(accepted)).to.deep.equal(["mid", "top"]);
  });

  it("accepts loads 0 and 100 with the widest inclusive threshold", () => {
    const records = sampleServers();

    expect(records.every((record) => accepts(loadAtMost(100), record))).to.equal(true);
    expect(domainsOf(records.filter((record) => accepts(loadAtMost(0), record)))).to.deep.equal(["fr1"]);
  });

  it("accepts everything with an empty conjunction and nothing with an empty country set", () => {
    const records = sampleServers();

    expect(records.every((record) => accepts(allOf([]), record))).to.equal(true);
    expect(records.some((record) => accepts(countrySet([]), record))).to.equal(false);
  });

  it("rejects load bounds outside 0..100", () => {
    expect(() => loadAtMost(101))
      .to.throw(InvalidFilterError, "max must be an integer between 0 and 100")
      .with.property("code", "E-FILTER-INVALID");
    expect(() => loadAtMost(-1)).to.throw(InvalidFilterError);
    expect(() => loadAtMost(12.5)).to.throw(InvalidFilterError);
    expect(() => loadRange(-1, 10)).to.throw("min must be an integer between 0 and 100");
  });

  it("rejects a range whose lower bound exceeds the upper bound", () => {
    expect(() => loadRange(60, 40))
      .to.throw(InvalidFilterError, "load range lower bound exceeds its upper bound")
      .with.deep.property("details", { min: 60, max: 40 });
  });

  it("matches allow and deny entries case-insensitively", () => {
    const denied = new ServerCatalog(sampleServers());
    denied.apply(blacklist(["US1", " Fr1 "]));
    expect(domainsOf(denied.toArray())).to.deep.equal(["us2", "be1", "de1", "nl1"]);

    const allowed = new ServerCatalog(sampleServers());
    allowed.apply(whitelist(["BE1"]));
    expect(domainsOf(allowed.toArray())).to.deep.equal(["be1"]);
  });

  it("describes predicates for log payloads", () => {
    expect(describePredicate(country("us"))).to.equal("country=US");
    expect(describePredicate(not(category("p2p")))).to.equal("!category=p2p");
    expect(describePredicate(countrySet(["be", "nl"]))).to.equal("country in [BE,NL]");
    expect(describePredicate(loadAtMost(30))).to.equal("load<=30");
    expect(describePredicate(loadRange(10, 50))).to.equal("10<load<50");
    expect(describePredicate(whitelist(["a.example", "b.example"]))).to.equal("whitelist(2)");
    expect(describePredicate(allOf([protocol("tcp"), blacklist([])]))).to.equal("protocol=tcp & blacklist(0)");
  });
});
