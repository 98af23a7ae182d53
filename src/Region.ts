const KNOWN_TAGS = [
  'UsEast1', 'UsEast2', 'UsWest1', 'UsWest2', 'CaCentral1',
  'ApSouth1', 'ApNortheast1', 'ApNortheast2', 'ApSoutheast1', 'ApSoutheast2',
  'EuCentral1', 'EuWest1', 'EuWest2', 'EuWest3', 'SaEast1',
  'DoNyc3', 'DoAms3', 'DoSgp1',
] as const;

export type KnownRegionTag = (typeof KNOWN_TAGS)[number];

/**
 * Fixed table of known S3 regions: the name accepted by Region.parse (and returned by display)
 * and the default host authority used to reach it.
 */
const KNOWN_REGIONS = {
  UsEast1: { name: 'us-east-1', host: 's3.amazonaws.com' },
  UsEast2: { name: 'us-east-2', host: 's3-us-east-2.amazonaws.com' },
  UsWest1: { name: 'us-west-1', host: 's3-us-west-1.amazonaws.com' },
  UsWest2: { name: 'us-west-2', host: 's3-us-west-2.amazonaws.com' },
  CaCentral1: { name: 'ca-central-1', host: 's3-ca-central-1.amazonaws.com' },
  ApSouth1: { name: 'ap-south-1', host: 's3-ap-south-1.amazonaws.com' },
  ApNortheast1: { name: 'ap-northeast-1', host: 's3-ap-northeast-1.amazonaws.com' },
  ApNortheast2: { name: 'ap-northeast-2', host: 's3-ap-northeast-2.amazonaws.com' },
  ApSoutheast1: { name: 'ap-southeast-1', host: 's3-ap-southeast-1.amazonaws.com' },
  ApSoutheast2: { name: 'ap-southeast-2', host: 's3-ap-southeast-2.amazonaws.com' },
  EuCentral1: { name: 'eu-central-1', host: 's3-eu-central-1.amazonaws.com' },
  EuWest1: { name: 'eu-west-1', host: 's3-eu-west-1.amazonaws.com' },
  EuWest2: { name: 'eu-west-2', host: 's3-eu-west-2.amazonaws.com' },
  EuWest3: { name: 'eu-west-3', host: 's3-eu-west-3.amazonaws.com' },
  SaEast1: { name: 'sa-east-1', host: 's3-sa-east-1.amazonaws.com' },
  DoNyc3: { name: 'nyc3', host: 'nyc3.digitaloceanspaces.com' },
  DoAms3: { name: 'ams3', host: 'ams3.digitaloceanspaces.com' },
  DoSgp1: { name: 'sgp1', host: 'sgp1.digitaloceanspaces.com' },
} as const satisfies Record<KnownRegionTag, { name: string, host: string }>;

export type KnownRegionName = (typeof KNOWN_REGIONS)[KnownRegionTag]['name'];
export type RegionTag = KnownRegionTag | 'Custom';

export type RegionValue =
  | { kind: 'known', tag: KnownRegionTag }
  | { kind: 'custom', endpoint: string };

export const DEFAULT_SCHEME = 'https';
export const CUSTOM_DISPLAY = 'custom';
const SCHEME_SEPARATOR = '://';

const TAGS_BY_NAME = new Map<string, KnownRegionTag>(
  KNOWN_TAGS.map(tag => [KNOWN_REGIONS[tag].name, tag])
);

/**
 * An S3 region identifier. Either one of the known regions in the table above, or a custom value
 * holding an arbitrary endpoint, which may be a bare host ("minio.local:9000") or a full origin
 * ("http://minio.local:9000"). Custom values are not validated: an unreachable endpoint surfaces
 * as a transport error wherever the region is eventually used.
 *
 * Instances are frozen. Known regions are singletons, so Region.parse('eu-west-1') === Region.EuWest1.
 *
 * @example
 * const region = Region.parse(process.env.AWS_REGION ?? 'us-east-1');
 * const url = `${region.scheme}://${region.host}/my-bucket/key`;
 */
export class Region {
  private static readonly singletons = new Map<KnownRegionTag, Region>();

  public static readonly UsEast1 = Region.knownRegion('UsEast1');
  public static readonly UsEast2 = Region.knownRegion('UsEast2');
  public static readonly UsWest1 = Region.knownRegion('UsWest1');
  public static readonly UsWest2 = Region.knownRegion('UsWest2');
  public static readonly CaCentral1 = Region.knownRegion('CaCentral1');
  public static readonly ApSouth1 = Region.knownRegion('ApSouth1');
  public static readonly ApNortheast1 = Region.knownRegion('ApNortheast1');
  public static readonly ApNortheast2 = Region.knownRegion('ApNortheast2');
  public static readonly ApSoutheast1 = Region.knownRegion('ApSoutheast1');
  public static readonly ApSoutheast2 = Region.knownRegion('ApSoutheast2');
  public static readonly EuCentral1 = Region.knownRegion('EuCentral1');
  public static readonly EuWest1 = Region.knownRegion('EuWest1');
  public static readonly EuWest2 = Region.knownRegion('EuWest2');
  public static readonly EuWest3 = Region.knownRegion('EuWest3');
  public static readonly SaEast1 = Region.knownRegion('SaEast1');
  public static readonly DoNyc3 = Region.knownRegion('DoNyc3');
  public static readonly DoAms3 = Region.knownRegion('DoAms3');
  public static readonly DoSgp1 = Region.knownRegion('DoSgp1');

  private constructor(public readonly value: RegionValue) {
    Object.freeze(this.value);
    Object.freeze(this);
  }

  private static knownRegion(tag: KnownRegionTag): Region {
    let region = Region.singletons.get(tag);
    if ( ! region) {
      region = new Region({ kind: 'known', tag });
      Region.singletons.set(tag, region);
    }
    return region;
  }

  /**
   * Matches the input case-sensitively against the known region names. Anything else,
   * including the empty string, becomes a custom region holding the input verbatim.
   */
  public static parse(input: string): Region {
    const tag = TAGS_BY_NAME.get(input);
    return tag ? Region.knownRegion(tag) : new Region({ kind: 'custom', endpoint: input });
  }

  /**
   * Builds a custom region without consulting the known region table.
   * @param endpoint - A bare host, or an origin with a scheme prefix.
   */
  public static custom(endpoint: string): Region {
    return new Region({ kind: 'custom', endpoint });
  }

  /**
   * All known regions in table order.
   */
  public static known(): Region[] {
    return KNOWN_TAGS.map(tag => Region.knownRegion(tag));
  }

  public static isKnownName(value: string): value is KnownRegionName {
    return TAGS_BY_NAME.has(value);
  }

  public get tag(): RegionTag {
    return this.value.kind === 'known' ? this.value.tag : 'Custom';
  }

  public get isCustom(): boolean {
    return this.value.kind === 'custom';
  }

  /**
   * Human readable label for logging. Custom regions always display as "custom",
   * never as their endpoint.
   */
  public get display(): string {
    const { value } = this;
    return value.kind === 'known' ? KNOWN_REGIONS[value.tag].name : CUSTOM_DISPLAY;
  }

  /**
   * The default host of a known region, or the stored value of a custom one.
   * For custom regions this may still carry a scheme prefix: use host to get a bare authority.
   */
  public get endpoint(): string {
    const { value } = this;
    return value.kind === 'known' ? KNOWN_REGIONS[value.tag].host : value.endpoint;
  }

  public get scheme(): string {
    const { value } = this;
    if (value.kind === 'known') {
      return DEFAULT_SCHEME;
    }
    const pos = value.endpoint.indexOf(SCHEME_SEPARATOR);
    return pos === -1 ? DEFAULT_SCHEME : value.endpoint.substring(0, pos);
  }

  public get host(): string {
    const { value } = this;
    if (value.kind === 'known') {
      return this.endpoint;
    }
    const pos = value.endpoint.indexOf(SCHEME_SEPARATOR);
    return pos === -1 ? value.endpoint : value.endpoint.substring(pos + SCHEME_SEPARATOR.length);
  }

  /**
   * Scheme and host joined into an origin, e.g. "https://s3-eu-west-1.amazonaws.com".
   */
  public get origin(): string {
    return `${this.scheme}${SCHEME_SEPARATOR}${this.host}`;
  }

  public equals(other: Region): boolean {
    const a = this.value;
    const b = other.value;
    if (a.kind === 'known' && b.kind === 'known') {
      return a.tag === b.tag;
    }
    if (a.kind === 'custom' && b.kind === 'custom') {
      return a.endpoint === b.endpoint;
    }
    return false;
  }

  public toString(): string {
    return this.display;
  }
}
