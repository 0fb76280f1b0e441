import "@nivinjoseph/n-ext";

export { StackConfig } from "./stack-config.js";
export { EnvType } from "./env-type.js";

export { describeError } from "./logging/provision-logger.js";
export type { ProvisionLogger } from "./logging/provision-logger.js";
export { EngineProvisionLogger } from "./logging/engine-provision-logger.js";
export { FileProvisionLogger } from "./logging/file-provision-logger.js";

export type { VpcSubnetType } from "./vpc/vpc-subnet-type.js";
export { VpcAz } from "./vpc/vpc-az.js";
export type { VpcSubnetConfig } from "./vpc/vpc-subnet-config.js";
export type { VpcConfig } from "./vpc/vpc-config.js";
export { VpcProvisioner } from "./vpc/vpc-provisioner.js";
export type { VpcDetails } from "./vpc/vpc-details.js";

export type { SecurityGroupRule } from "./security/security-group/security-group-rule.js";
export type { SecurityGroupConfig } from "./security/security-group/security-group-config.js";
export { SecurityGroupProvisioner } from "./security/security-group/security-group-provisioner.js";
export type { SecurityGroupDetails } from "./security/security-group/security-group-details.js";

export type { PolicyDocument } from "./security/policy/policy-document.js";

export type { S3bucketConfig } from "./storage/s3bucket-config.js";
export { S3bucketProvisioner } from "./storage/s3bucket-provisioner.js";
export type { S3bucketDetails } from "./storage/s3bucket-details.js";

export type { MachineImageQuery } from "./compute/machine-image/machine-image-query.js";
export { MachineImageResolver } from "./compute/machine-image/machine-image-resolver.js";

export type { FleetConfig } from "./compute/fleet/fleet-config.js";
export { FleetProvisioner } from "./compute/fleet/fleet-provisioner.js";
export type { FleetDetails } from "./compute/fleet/fleet-details.js";

export type { Ec2InstanceConfig } from "./compute/instance/ec2-instance-config.js";
export { Ec2InstanceProvisioner } from "./compute/instance/ec2-instance-provisioner.js";
export type { Ec2InstanceDetails } from "./compute/instance/ec2-instance-details.js";

export type { PostgresConfig } from "./database/postgres/postgres-config.js";
export { PostgresProvisioner } from "./database/postgres/postgres-provisioner.js";
export type { PostgresDetails } from "./database/postgres/postgres-details.js";

export type { AlbConfig } from "./ingress/alb-config.js";
export { AlbProvisioner } from "./ingress/alb-provisioner.js";
export type { AlbDetails } from "./ingress/alb-details.js";

export { loadStackSettings } from "./stack/stack-settings.js";
export type { StackSettings } from "./stack/stack-settings.js";
export type { StackOutputs } from "./stack/stack-outputs.js";
export { StackProvisioner } from "./stack/stack-provisioner.js";
