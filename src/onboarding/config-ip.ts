// Address lines bound under the transport VPN (vpn 0) of a rendered device config
const VPN0_IPV4 = /vpn 0[\s\S]+?ip\saddress\s(\d{1,3}(?:\.\d{1,3}){3})/;
const VPN0_IPV6 = /vpn 0[\s\S]+?ipv6\saddress\s([0-9a-fA-F:]+)/;

/**
 * Management addresses of an already onboarded control component.
 *
 * Heuristic over the attached configuration text: the first IPv4 address under
 * `vpn 0`, or the reported management IP when none matches, plus the first IPv6
 * address under `vpn 0` if present.
 */
export function extractManagementIps(configText: string, fallbackIp?: string): string[] {
	const ips: string[] = [];

	const ipv4 = VPN0_IPV4.exec(configText);
	if (ipv4) {
		ips.push(ipv4[1]);
	} else if (fallbackIp) {
		ips.push(fallbackIp);
	}

	const ipv6 = VPN0_IPV6.exec(configText);
	if (ipv6) {
		ips.push(ipv6[1]);
	}

	return ips;
}
