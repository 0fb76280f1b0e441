import { given } from "@nivinjoseph/n-defensive";
import * as aws from "@pulumi/aws";
import { StackConfig } from "../../stack-config.js";
import type { SecurityGroupConfig } from "./security-group-config.js";
import type { SecurityGroupDetails } from "./security-group-details.js";
import type { SecurityGroupRule } from "./security-group-rule.js";


export class SecurityGroupProvisioner
{
    private readonly _name: string;
    private readonly _config: SecurityGroupConfig;


    public constructor(name: string, config: SecurityGroupConfig)
    {
        given(name, "name").ensureHasValue().ensureIsString();
        name = name.trim();
        if (!name.endsWith("-sg"))
            name += "-sg";
        this._name = name;

        given(config, "config").ensureHasValue().ensureIsObject()
            .ensureHasStructure({
                vpcId: "object",
                ingressRules: [{
                    protocol: "string",
                    fromPort: "number",
                    toPort: "number",
                    cidrBlocks: ["string"],
                    "description?": "string"
                }],
                "description?": "string",
                "provider?": "object"
            })
            .ensure(t => t.ingressRules.isNotEmpty, "at least 1 ingress rule must be provided");
        config.ingressRules.forEach(rule => this._validateRule(rule));
        config.description ??= `Security group for ${name}`;
        this._config = config;
    }


    public provision(): SecurityGroupDetails
    {
        try
        {
            const securityGroup = new aws.ec2.SecurityGroup(this._name, {
                vpcId: this._config.vpcId,
                description: this._config.description,
                revokeRulesOnDelete: true,
                ingress: this._config.ingressRules.map(t => ({
                    protocol: t.protocol,
                    fromPort: t.fromPort,
                    toPort: t.toPort,
                    cidrBlocks: [...t.cidrBlocks],
                    description: t.description
                })),
                egress: [{
                    protocol: "-1",
                    fromPort: 0,
                    toPort: 0,
                    cidrBlocks: ["0.0.0.0/0"]
                }],
                tags: {
                    ...StackConfig.tags,
                    Name: this._name
                }
            }, {
                provider: this._config.provider
            });

            StackConfig.logger.logInfo(`Created security group: ${this._name}`);

            return {
                securityGroupId: securityGroup.id
            };
        }
        catch (e)
        {
            StackConfig.logger.logError(`Failed to create security group ${this._name}`, e);
            throw e;
        }
    }

    private _validateRule(rule: SecurityGroupRule): void
    {
        given(rule, "rule")
            .ensure(t => t.protocol.trim().length > 0, "protocol cannot be blank")
            .ensure(t => [t.fromPort, t.toPort].every(u => Number.isInteger(u) && u >= 0 && u <= 65535),
                "ports must be whole numbers between 0 and 65535 inclusive")
            .ensure(t => t.fromPort <= t.toPort, "fromPort cannot be greater than toPort")
            .ensure(t => t.cidrBlocks.isNotEmpty, "at least 1 cidr block must be provided per rule");
    }
}
