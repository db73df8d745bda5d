export { parsePackageUrl, PackageUrlError, type PackageUrl } from "./purl";
