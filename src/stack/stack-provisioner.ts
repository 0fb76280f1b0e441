import { given } from "@nivinjoseph/n-defensive";
import * as aws from "@pulumi/aws";
import { MachineImageResolver } from "../compute/machine-image/machine-image-resolver.js";
import { FleetProvisioner } from "../compute/fleet/fleet-provisioner.js";
import { Ec2InstanceProvisioner } from "../compute/instance/ec2-instance-provisioner.js";
import { PostgresProvisioner } from "../database/postgres/postgres-provisioner.js";
import { AlbProvisioner } from "../ingress/alb-provisioner.js";
import { SecurityGroupProvisioner } from "../security/security-group/security-group-provisioner.js";
import { StackConfig } from "../stack-config.js";
import { S3bucketProvisioner } from "../storage/s3bucket-provisioner.js";
import { VpcAz } from "../vpc/vpc-az.js";
import { VpcProvisioner } from "../vpc/vpc-provisioner.js";
import type { StackOutputs } from "./stack-outputs.js";
import type { StackSettings } from "./stack-settings.js";


/**
 * Declares the whole stack in dependency order:
 * network, security groups, storage, compute, database, load balancer.
 *
 * The first failure is logged and re-thrown; nothing after it is declared.
 */
export class StackProvisioner
{
    private readonly _settings: StackSettings;


    public constructor(settings: StackSettings)
    {
        given(settings, "settings").ensureHasValue().ensureIsObject()
            .ensureHasStructure({
                region: "string",
                instanceType: "string",
                bucketName: "string",
                bucketIsPublic: "boolean",
                dbName: "string",
                dbInstanceClass: "string",
                minSize: "number",
                maxSize: "number",
                desiredCapacity: "number",
                bastionEnabled: "boolean",
                logFile: "string"
            });
        given(settings.dbUsername, "settings.dbUsername").ensureHasValue();
        this._settings = settings;
    }


    public async provision(): Promise<StackOutputs>
    {
        const settings = this._settings;
        const logger = StackConfig.logger;

        try
        {
            const provider = new aws.Provider("aws-provider", {
                region: settings.region
            });

            const vpcDetails = new VpcProvisioner("app", {
                cidr16Bits: "10.0",
                region: settings.region,
                subnets: [
                    { name: "subnet-1", type: "public", cidrOctet3: 1, az: VpcAz.a },
                    { name: "subnet-2", type: "public", cidrOctet3: 2, az: VpcAz.b }
                ],
                provider
            }).provision();

            const webSg = new SecurityGroupProvisioner("web", {
                vpcId: vpcDetails.vpcId,
                ingressRules: [
                    { protocol: "tcp", fromPort: 80, toPort: 80, cidrBlocks: ["0.0.0.0/0"], description: "http" },
                    { protocol: "tcp", fromPort: 22, toPort: 22, cidrBlocks: ["0.0.0.0/0"], description: "ssh" }
                ],
                provider
            }).provision();

            const dbSg = new SecurityGroupProvisioner("db", {
                vpcId: vpcDetails.vpcId,
                ingressRules: [
                    { protocol: "tcp", fromPort: 5432, toPort: 5432, cidrBlocks: [vpcDetails.cidrBlock], description: "postgres" }
                ],
                provider
            }).provision();

            const bucketDetails = new S3bucketProvisioner("static-content", {
                bucketName: settings.bucketName,
                isPublic: settings.bucketIsPublic,
                provider
            }).provision();

            const imageId = await new MachineImageResolver({ provider }).resolveLatest(settings.region);

            const fleetDetails = new FleetProvisioner("app", {
                imageId,
                instanceType: settings.instanceType,
                securityGroupIds: [webSg.securityGroupId],
                subnetIds: vpcDetails.subnetIds,
                minSize: settings.minSize,
                maxSize: settings.maxSize,
                desiredCapacity: settings.desiredCapacity,
                provider
            }).provision();

            const bastionDetails = settings.bastionEnabled
                ? new Ec2InstanceProvisioner("bastion", {
                    imageId,
                    instanceType: settings.instanceType,
                    subnetId: vpcDetails.subnetIds[0],
                    securityGroupIds: [webSg.securityGroupId],
                    associatePublicIpAddress: true,
                    provider
                }).provision()
                : null;

            const dbDetails = new PostgresProvisioner("app-db", {
                subnetIds: vpcDetails.subnetIds,
                securityGroupIds: [dbSg.securityGroupId],
                databaseName: settings.dbName,
                instanceClass: settings.dbInstanceClass,
                username: settings.dbUsername,
                password: settings.dbPassword ?? undefined,
                provider
            }).provision();

            const albDetails = new AlbProvisioner("app", {
                subnetIds: vpcDetails.subnetIds,
                securityGroupIds: [webSg.securityGroupId],
                autoScalingGroupNames: [fleetDetails.autoScalingGroupName],
                provider
            }).provision();

            const outputs: StackOutputs = {
                vpc_id: vpcDetails.vpcId,
                subnet_ids: vpcDetails.subnetIds,
                bucket_name: bucketDetails.bucketName,
                bucket_arn: bucketDetails.bucketArn,
                asg_name: fleetDetails.autoScalingGroupName,
                db_endpoint: dbDetails.endpoint,
                alb_dns_name: albDetails.dnsName
            };

            if (bucketDetails.websiteEndpoint != null)
                outputs.bucket_website_endpoint = bucketDetails.websiteEndpoint;

            if (bastionDetails != null)
                outputs.bastion_public_ip = bastionDetails.publicIp;

            logger.logInfo("Deployment completed successfully");

            return outputs;
        }
        catch (e)
        {
            logger.logError("Deployment failed", e);
            throw e;
        }
    }
}
