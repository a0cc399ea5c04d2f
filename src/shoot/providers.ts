import { ConversionError } from "../errors";
import { Shoot } from "../types";

export type ProviderType = "aws" | "azure" | "gcp" | "openstack" | "alicloud";

interface ProviderTraits {
  cloudProfileName: string;
  /** Only set where the hyperscaler needs an explicit network exposure class. */
  exposureClassName?: string;
}

// Adding a hyperscaler means adding a row here.
const PROVIDER_TRAITS: Record<ProviderType, ProviderTraits> = {
  aws: { cloudProfileName: "aws" },
  azure: { cloudProfileName: "az" },
  gcp: { cloudProfileName: "gcp" },
  openstack: {
    cloudProfileName: "converged-cloud",
    exposureClassName: "converged-cloud-internet",
  },
  alicloud: { cloudProfileName: "alicloud" },
};

function isProviderType(value: string): value is ProviderType {
  return Object.prototype.hasOwnProperty.call(PROVIDER_TRAITS, value);
}

export function parseProviderType(value: string): ProviderType {
  if (!isProviderType(value)) {
    throw new ConversionError(`unsupported provider type "${value}"`);
  }
  return value;
}

export function applyProviderTraits(type: ProviderType, shoot: Shoot): void {
  const traits = PROVIDER_TRAITS[type];
  shoot.spec.cloudProfileName = traits.cloudProfileName;
  if (traits.exposureClassName) {
    shoot.spec.exposureClassName = traits.exposureClassName;
  }
}
