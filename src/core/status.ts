import net from 'net';

export type ServiceStatus = {
  name: string;
  port: number;
  running: boolean;
};

export type PortProbe = (port: number) => Promise<boolean>;

export function probePort(port: number, host = '127.0.0.1', timeoutMs = 500): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.createConnection({ port, host });
    const finish = (running: boolean) => {
      socket.destroy();
      resolve(running);
    };
    socket.setTimeout(timeoutMs, () => finish(false));
    socket.once('connect', () => finish(true));
    socket.once('error', () => finish(false));
  });
}

export async function getServiceStatus(
  services: { name: string; port: number }[],
  probe: PortProbe = probePort,
): Promise<ServiceStatus[]> {
  const status: ServiceStatus[] = [];
  for (const service of services) {
    status.push({ ...service, running: await probe(service.port) });
  }
  return status;
}

export function formatServiceLine(service: ServiceStatus): string {
  return `${service.name} (port ${service.port}) status - ${service.running ? 'RUNNING' : 'NOT RUNNING'}`;
}
