import { given } from "@nivinjoseph/n-defensive";
import * as aws from "@pulumi/aws";
import { StackConfig } from "../../stack-config.js";
import type { Ec2InstanceConfig } from "./ec2-instance-config.js";
import type { Ec2InstanceDetails } from "./ec2-instance-details.js";


export class Ec2InstanceProvisioner
{
    private readonly _name: string;
    private readonly _config: Ec2InstanceConfig;


    public constructor(name: string, config: Ec2InstanceConfig)
    {
        given(name, "name").ensureHasValue().ensureIsString();
        this._name = name.trim();

        given(config, "config").ensureHasValue().ensureIsObject()
            .ensureHasStructure({
                imageId: "string",
                instanceType: "string",
                subnetId: "object",
                securityGroupIds: ["object"],
                "associatePublicIpAddress?": "boolean",
                "provider?": "object"
            })
            .ensure(t => t.imageId.startsWith("ami-"), "imageId must be an ami id")
            .ensure(t => t.securityGroupIds.isNotEmpty, "at least 1 security group must be provided");
        config.associatePublicIpAddress ??= false;
        this._config = config;
    }


    public provision(): Ec2InstanceDetails
    {
        try
        {
            const instance = new aws.ec2.Instance(this._name, {
                ami: this._config.imageId,
                instanceType: this._config.instanceType,
                subnetId: this._config.subnetId,
                vpcSecurityGroupIds: [...this._config.securityGroupIds],
                associatePublicIpAddress: this._config.associatePublicIpAddress,
                metadataOptions: {
                    httpTokens: "required"
                },
                tags: {
                    ...StackConfig.tags,
                    Name: this._name
                }
            }, {
                provider: this._config.provider
            });

            StackConfig.logger.logInfo(`Created EC2 instance: ${this._name}`);

            return {
                instanceId: instance.id,
                publicIp: instance.publicIp
            };
        }
        catch (e)
        {
            StackConfig.logger.logError(`Failed to create EC2 instance ${this._name}`, e);
            throw e;
        }
    }
}
